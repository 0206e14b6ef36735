import { promises as fs } from 'fs';
import path from 'path';
import lockfile, { type LockOptions } from 'proper-lockfile';
import type { IStateStore } from '../../application/ports/IStateStore';
import { NotificationState } from '../../domain/entities/NotificationState';
import {
  StateDocumentSchema,
  UserSlotStateSchema,
  type StateFile,
} from '../../../../shared/validation/schemas';
import { StateIOError } from '../../../../domain/errors/StateIOError';
import { logger } from '../../../../shared/logger';
import { errorMessage, hasErrorCode } from '../../../../shared/errors';
import { stateToDomain, stateToFile } from './mappers/stateMapper';

const LOCK_OPTIONS: LockOptions = {
  realpath: false,
  retries: { retries: 5, minTimeout: 100, maxTimeout: 1000 },
};

/**
 * JsonFileStateStore
 *
 * Implements IStateStore on a single JSON file.
 *
 * - Every read and every write holds an exclusive lock (`<file>.lock`)
 * - Writes go to a temporary sibling that is renamed over the file
 * - A missing file is an empty state; a file that is not valid JSON or not a
 *   state document is logged and read as empty (the next save rewrites it)
 * - Each user record is validated on its own; an unreadable record is dropped
 *   with a warning and the other users keep their state
 * - Any other filesystem failure is a StateIOError
 */
export class JsonFileStateStore implements IStateStore {
  public constructor(private readonly filePath: string) {}

  public async load(): Promise<NotificationState> {
    if (!(await this.exists())) {
      logger.debug({ msg: 'No state file yet, starting empty', filePath: this.filePath });
      return NotificationState.empty();
    }

    const raw = await this.withLock('read', () => fs.readFile(this.filePath, 'utf-8'));

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({
        msg: 'State file is not valid JSON, starting empty',
        filePath: this.filePath,
        error: errorMessage(error),
      });
      return NotificationState.empty();
    }

    const document = StateDocumentSchema.safeParse(json);
    if (!document.success) {
      logger.warn({
        msg: 'State file has an unexpected shape, starting empty',
        filePath: this.filePath,
        error: document.error.message,
      });
      return NotificationState.empty();
    }

    const users: StateFile['users'] = {};
    for (const [userName, record] of Object.entries(document.data.users)) {
      const parsed = UserSlotStateSchema.safeParse(record);
      if (!parsed.success) {
        logger.warn({
          msg: 'Dropping unreadable state record',
          filePath: this.filePath,
          user: userName,
          error: parsed.error.message,
        });
        continue;
      }
      users[userName] = parsed.data;
    }

    return stateToDomain({ users });
  }

  public async save(state: NotificationState): Promise<void> {
    const body = `${JSON.stringify(stateToFile(state), null, 2)}\n`;
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw this.ioError('create directory for', error);
    }

    await this.withLock('write', async () => {
      try {
        await fs.writeFile(tempPath, body, 'utf-8');
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await this.removeTempFile(tempPath);
        throw error;
      }
    });

    logger.debug({ msg: 'State saved', filePath: this.filePath, users: state.size });
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    await fs.rm(tempPath, { force: true }).catch((error: unknown) => {
      logger.warn({ msg: 'Failed to remove temporary state file', tempPath, error: errorMessage(error) });
    });
  }

  private async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw this.ioError('access', error);
    }
  }

  private async withLock<T>(action: string, operation: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.filePath, LOCK_OPTIONS);
    } catch (error) {
      throw this.ioError(`lock for ${action}`, error);
    }

    try {
      return await operation();
    } catch (error) {
      throw this.ioError(action, error);
    } finally {
      await release().catch((error: unknown) => {
        logger.warn({
          msg: 'Failed to release state file lock',
          filePath: this.filePath,
          error: errorMessage(error),
        });
      });
    }
  }

  private ioError(action: string, error: unknown): StateIOError {
    const reason = errorMessage(error);
    return new StateIOError(`Failed to ${action} state file ${this.filePath}: ${reason}`, this.filePath);
  }
}
