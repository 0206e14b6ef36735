import type { DateTime } from 'luxon';
import type { NotificationState } from '../entities/NotificationState';

export interface EligibilityFlags {
  force: boolean;
  testMode: boolean;
}

/**
 * SlotStateTracker - gates and records sends against the per-day state
 *
 * Reads go through SlotState's date-aware accessors, so a record from an
 * earlier day counts as empty without being rewritten.
 */
export class SlotStateTracker {
  /**
   * A slot is eligible when forced, in test mode, or not yet sent on `date`.
   */
  public isSlotEligible(
    state: NotificationState,
    userName: string,
    date: string,
    slot: number,
    flags: EligibilityFlags
  ): boolean {
    if (flags.force || flags.testMode) {
      return true;
    }
    return !state.getOrEmpty(userName).hasSentSlot(date, slot);
  }

  /**
   * Asset ids already delivered to the user on `date`
   */
  public assetsSentToday(state: NotificationState, userName: string, date: string): ReadonlySet<string> {
    return state.getOrEmpty(userName).assetsSentOn(date);
  }

  /**
   * Records a send. Skipped entirely in test mode.
   *
   * @returns true when the state was changed
   */
  public recordSend(
    state: NotificationState,
    userName: string,
    date: string,
    slot: number,
    assetId: string | null,
    sentAt: DateTime,
    testMode: boolean
  ): boolean {
    if (testMode) {
      return false;
    }
    state.set(userName, state.getOrEmpty(userName).recordSend(date, slot, assetId, sentAt));
    return true;
  }
}
