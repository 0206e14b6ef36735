import type { DateTime } from 'luxon';

export interface SlotStateProps {
  /** ISO date (YYYY-MM-DD) the "today" fields belong to, or null before the first send */
  slotsDate: string | null;
  slotsSent: number[];
  assetsSentToday: string[];
  /** ISO-8601 timestamp of the last recorded send */
  lastSlotTime: string | null;
}

/**
 * SlotState entity
 * Per-user record of which slots and which assets went out on `slotsDate`.
 * Immutable - recordSend returns a new instance.
 *
 * Day rollover: every read takes the target date and treats a record for any
 * other date as empty, whatever its stored lists contain.
 */
export class SlotState {
  public readonly slotsDate: string | null;
  public readonly slotsSent: readonly number[];
  public readonly assetsSentToday: readonly string[];
  public readonly lastSlotTime: string | null;

  public constructor(props: SlotStateProps) {
    this.slotsDate = props.slotsDate;
    this.slotsSent = [...props.slotsSent];
    this.assetsSentToday = [...props.assetsSentToday];
    this.lastSlotTime = props.lastSlotTime;
  }

  public static empty(): SlotState {
    return new SlotState({ slotsDate: null, slotsSent: [], assetsSentToday: [], lastSlotTime: null });
  }

  public isFor(date: string): boolean {
    return this.slotsDate === date;
  }

  public slotsSentOn(date: string): readonly number[] {
    return this.isFor(date) ? this.slotsSent : [];
  }

  public assetsSentOn(date: string): ReadonlySet<string> {
    return new Set(this.isFor(date) ? this.assetsSentToday : []);
  }

  public hasSentSlot(date: string, slot: number): boolean {
    return this.slotsSentOn(date).includes(slot);
  }

  /**
   * Records one send. A record for another date is cleared first.
   * Slot and asset id are appended only when absent; a null asset id records
   * the slot alone.
   */
  public recordSend(date: string, slot: number, assetId: string | null, sentAt: DateTime): SlotState {
    const slotsSent = [...this.slotsSentOn(date)];
    const assetsSentToday = this.isFor(date) ? [...this.assetsSentToday] : [];

    if (!slotsSent.includes(slot)) {
      slotsSent.push(slot);
    }
    if (assetId && !assetsSentToday.includes(assetId)) {
      assetsSentToday.push(assetId);
    }

    return new SlotState({
      slotsDate: date,
      slotsSent,
      assetsSentToday,
      lastSlotTime: sentAt.toISO(),
    });
  }
}
