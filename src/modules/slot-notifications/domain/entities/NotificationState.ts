import { SlotState } from './SlotState';

/**
 * NotificationState
 * In-memory copy of the persisted state: user name → SlotState.
 * Loaded once per run, mutated by the dispatcher, saved once at the end.
 */
export class NotificationState {
  private readonly users: Map<string, SlotState>;

  public constructor(users?: Iterable<[string, SlotState]>) {
    this.users = new Map(users ?? []);
  }

  public static empty(): NotificationState {
    return new NotificationState();
  }

  public get(userName: string): SlotState | undefined {
    return this.users.get(userName);
  }

  /** Stored record, or an empty one for a user that never received anything */
  public getOrEmpty(userName: string): SlotState {
    return this.users.get(userName) ?? SlotState.empty();
  }

  public set(userName: string, slotState: SlotState): void {
    this.users.set(userName, slotState);
  }

  public entries(): Array<[string, SlotState]> {
    return [...this.users.entries()];
  }

  public get size(): number {
    return this.users.size;
  }
}
