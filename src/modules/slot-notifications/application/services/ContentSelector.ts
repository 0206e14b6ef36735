import type { DateTime } from 'luxon';
import type { IPhotoLibraryClient } from '../ports/IPhotoLibraryClient';
import type { PersonRanker } from './PersonRanker';
import type { RetryPolicy } from '../../domain/services/RetryPolicy';
import type { Asset, ParsedMemories, Person, Settings, SlotContent } from '../../domain/types';
import { mathRandom, pickOne, shuffled, type RandomSource } from '../../../../shared/random';
import { logger } from '../../../../shared/logger';

/** Assets requested per person when looking for a person photo */
export const PERSON_ASSETS_PAGE_SIZE = 100;

export type SelectionSettings = Pick<
  Settings,
  'memorySlots' | 'personSlots' | 'fallbackSlots' | 'topPersonsLimit' | 'excludeRecentDays'
>;

export interface SelectionRequest {
  slot: number;
  memories: ParsedMemories;
  /** Asset ids already delivered to this user today */
  sentAssetIds: ReadonlySet<string>;
  now: DateTime;
}

/**
 * ContentSelector - decides what one slot sends for one user
 *
 * **Slot layout:**
 * | Day has memories | Slot | Content |
 * |------------------|------|---------|
 * | yes | 1..M | memory from years[(slot - 1) mod years.length] |
 * | yes | M+1..M+P | person photo |
 * | yes | > M+P | nothing |
 * | no | 1..fallback | person photo |
 * | no | > fallback | nothing |
 *
 * Memory assets prefer faces: top person > any named person > no named face.
 * Person photos come from the first person, in shuffled order, who has an
 * asset not sent today and older than `excludeRecentDays`.
 *
 * Face and person-asset lookup failures degrade the choice; they never abort it.
 */
export class ContentSelector {
  public constructor(
    private readonly client: IPhotoLibraryClient,
    private readonly ranker: PersonRanker,
    private readonly retry: RetryPolicy,
    private readonly settings: SelectionSettings,
    private readonly random: RandomSource = mathRandom,
    private readonly logContext: Record<string, unknown> = {}
  ) {}

  /**
   * @returns the content for the slot, or null when the slot has nothing to send
   * @throws UpstreamError when a person slot cannot rank people at all
   */
  public async select(request: SelectionRequest): Promise<SlotContent | null> {
    const { slot, memories } = request;
    const { memorySlots, personSlots, fallbackSlots } = this.settings;

    if (memories.years.length > 0) {
      if (slot <= memorySlots) {
        return this.selectMemory(request);
      }
      if (slot <= memorySlots + personSlots) {
        return this.selectPerson(request);
      }
      return null;
    }

    if (slot <= fallbackSlots) {
      return this.selectPerson(request);
    }
    return null;
  }

  /**
   * Face-preference pick among `assets`, skipping ones already sent.
   * When every asset was already sent, falls back to any of `assets`.
   */
  public async selectMemoryAsset(
    assets: readonly Asset[],
    sentAssetIds: ReadonlySet<string>,
    topPersonIds: ReadonlySet<string>
  ): Promise<Asset | null> {
    const candidates = assets.filter((asset) => !sentAssetIds.has(asset.id));

    const withTopPerson: Asset[] = [];
    const withNamedFace: Asset[] = [];
    const withoutNamedFace: Asset[] = [];

    for (const asset of candidates) {
      const faces = await this.facesIn(asset);
      if (faces.some((face) => topPersonIds.has(face.id))) {
        withTopPerson.push(asset);
      } else if (faces.some((face) => face.name.trim() !== '')) {
        withNamedFace.push(asset);
      } else {
        withoutNamedFace.push(asset);
      }
    }

    logger.debug({
      msg: 'Memory asset tiers',
      ...this.logContext,
      topPerson: withTopPerson.length,
      namedFace: withNamedFace.length,
      noNamedFace: withoutNamedFace.length,
      alreadySent: assets.length - candidates.length,
    });

    const tier = [withTopPerson, withNamedFace, withoutNamedFace].find((bucket) => bucket.length > 0);
    return pickOne(this.random, tier ?? assets) ?? null;
  }

  /**
   * First person (in shuffled order) with a valid asset wins; the asset is a
   * uniform pick among that person's valid assets.
   */
  public async selectPersonAsset(
    persons: readonly Person[],
    sentAssetIds: ReadonlySet<string>,
    now: DateTime
  ): Promise<{ person: Person; asset: Asset } | null> {
    const cutoff = now.minus({ days: this.settings.excludeRecentDays }).toMillis();

    for (const person of shuffled(this.random, persons)) {
      const assets = await this.assetsOf(person);
      const valid = assets.filter(
        (asset) =>
          !sentAssetIds.has(asset.id) && (asset.createdAt === null || asset.createdAt.toMillis() <= cutoff)
      );

      const asset = pickOne(this.random, valid);
      if (asset) {
        return { person, asset };
      }
    }

    return null;
  }

  private async selectMemory(request: SelectionRequest): Promise<SlotContent | null> {
    const { years, byYear } = request.memories;
    const year = years[(request.slot - 1) % years.length];
    const assets = year === undefined ? [] : (byYear.get(year)?.assets ?? []);
    if (year === undefined || assets.length === 0) {
      return null;
    }

    const hasUnsent = assets.some((asset) => !request.sentAssetIds.has(asset.id));
    const topPersonIds = hasUnsent ? await this.topPersonIdsForFaces() : new Set<string>();

    const asset = await this.selectMemoryAsset(assets, request.sentAssetIds, topPersonIds);
    return asset ? { kind: 'memory', year, asset } : null;
  }

  private async selectPerson(request: SelectionRequest): Promise<SlotContent | null> {
    const persons = await this.ranker.rankTopPersons(this.settings.topPersonsLimit);
    if (persons.length === 0) {
      logger.info({ msg: 'No named people to pick a photo from', ...this.logContext });
      return null;
    }

    const choice = await this.selectPersonAsset(persons, request.sentAssetIds, request.now);
    if (!choice) {
      logger.info({ msg: 'No person had an unsent, non-recent photo', ...this.logContext });
      return null;
    }
    return { kind: 'person', person: choice.person, asset: choice.asset };
  }

  private async topPersonIdsForFaces(): Promise<Set<string>> {
    try {
      const top = await this.ranker.rankTopPersons(this.settings.topPersonsLimit);
      return new Set(top.map((person) => person.id));
    } catch (error) {
      logger.warn({
        msg: 'Could not rank people, selecting memory without top-person preference',
        ...this.logContext,
        error: error instanceof Error ? error.message : String(error),
      });
      return new Set<string>();
    }
  }

  private async facesIn(asset: Asset): Promise<Person[]> {
    try {
      return await this.retry.run(() => this.client.fetchAssetPeople(asset.id), 'fetchAssetPeople', {
        ...this.logContext,
        assetId: asset.id,
      });
    } catch (error) {
      logger.warn({
        msg: 'Face lookup failed, treating asset as having no named face',
        ...this.logContext,
        assetId: asset.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async assetsOf(person: Person): Promise<Asset[]> {
    try {
      return await this.retry.run(
        () => this.client.fetchPersonAssets(person.id, PERSON_ASSETS_PAGE_SIZE),
        'fetchPersonAssets',
        { ...this.logContext, personId: person.id }
      );
    } catch (error) {
      logger.warn({
        msg: 'Could not fetch assets for person, trying the next one',
        ...this.logContext,
        personId: person.id,
        person: person.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
