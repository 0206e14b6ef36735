import type { IPhotoLibraryClient } from '../ports/IPhotoLibraryClient';
import type { RetryPolicy } from '../../domain/services/RetryPolicy';
import type { Person } from '../../domain/types';
import { logger } from '../../../../shared/logger';

/**
 * PersonRanker - orders the user's named people by approximate photo count
 *
 * Counts come from one size-1 metadata search per person, so ranking costs
 * one request per named person. A failed count keeps the person with count 0.
 * Rankings are a snapshot; faces added afterwards are picked up next run.
 */
export class PersonRanker {
  public constructor(
    private readonly client: IPhotoLibraryClient,
    private readonly retry: RetryPolicy,
    private readonly logContext: Record<string, unknown> = {}
  ) {}

  /**
   * @returns up to `limit` named people, highest count first; ties keep the
   *          photo service's order
   * @throws UpstreamError when the people list itself cannot be fetched
   */
  public async rankTopPersons(limit: number): Promise<Person[]> {
    if (limit <= 0) {
      return [];
    }

    const people = await this.retry.run(() => this.client.fetchPeople(), 'fetchPeople', this.logContext);
    const named = people.filter((person) => person.name.trim() !== '');

    const counted: Person[] = [];
    for (const person of named) {
      counted.push({ ...person, assetCount: await this.countAssets(person) });
    }

    counted.sort((a, b) => b.assetCount - a.assetCount);
    const top = counted.slice(0, limit);

    logger.debug({
      msg: 'Ranked top persons',
      ...this.logContext,
      namedPeople: named.length,
      top: top.map((person) => ({ name: person.name, assetCount: person.assetCount })),
    });

    return top;
  }

  private async countAssets(person: Person): Promise<number> {
    try {
      return await this.retry.run(() => this.client.countPersonAssets(person.id), 'countPersonAssets', {
        ...this.logContext,
        personId: person.id,
      });
    } catch (error) {
      logger.warn({
        msg: 'Could not count assets for person, ranking with 0',
        ...this.logContext,
        personId: person.id,
        person: person.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }
  }
}
