import type { NotificationState } from '../../domain/entities/NotificationState';

/**
 * IStateStore Port Interface
 *
 * Owns the persisted per-user slot state. The run loads it once, works on the
 * in-memory copy and saves once at the end (never per user, never in dry-run).
 *
 * @throws StateIOError when the backing store cannot be read, locked or written
 */
export interface IStateStore {
  load(): Promise<NotificationState>;

  save(state: NotificationState): Promise<void>;
}
