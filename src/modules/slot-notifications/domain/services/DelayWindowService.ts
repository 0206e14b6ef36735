import type { DateTime } from 'luxon';
import { ClockTime } from '../../../../shared/value-objects/ClockTime';
import { mathRandom, type RandomSource } from '../../../../shared/random';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import type { NotificationWindow } from '../types';

/** Test-mode delays stay short so verification runs finish quickly */
const TEST_MODE_DELAY_SECONDS = { min: 1, max: 5 } as const;

/**
 * DelayWindowService - spreads slot sends randomly across a clock-time window
 *
 * Windows are same-day only (`end` >= `start`); config validation rejects
 * overnight windows before this service ever sees them.
 */
export class DelayWindowService {
  public constructor(private readonly random: RandomSource = mathRandom) {}

  /**
   * Seconds to wait before sending, relative to `now`.
   *
   * - test mode: uniform integer in [1, 5], window ignored
   * - before the window: time until start plus a uniform offset in [0, end - start]
   * - inside the window: uniform offset in [0, end - now]
   * - at or after the end: 0
   *
   * @throws ValidationError if either bound is not HH:MM or end is before start
   */
  public computeDelay(windowStart: string, windowEnd: string, now: DateTime, testMode: boolean): number {
    if (testMode) {
      return this.random.integer(TEST_MODE_DELAY_SECONDS.min, TEST_MODE_DELAY_SECONDS.max);
    }

    const startTime = ClockTime.parse(windowStart);
    const endTime = ClockTime.parse(windowEnd);
    if (endTime.isBefore(startTime)) {
      throw new ValidationError(
        `Notification window ${windowStart}-${windowEnd} ends before it starts; overnight windows are not supported`,
        { start: windowStart, end: windowEnd }
      );
    }

    const start = startTime.on(now);
    const end = endTime.on(now);

    if (now.toMillis() < start.toMillis()) {
      const untilStart = wholeSeconds(start, now);
      return untilStart + this.random.integer(0, wholeSeconds(end, start));
    }
    if (now.toMillis() < end.toMillis()) {
      return this.random.integer(0, wholeSeconds(end, now));
    }
    return 0;
  }

  /**
   * Delay for a slot given the configured windows (index 0 is slot 1).
   * A slot without a window is sent immediately, except in test mode.
   */
  public computeSlotDelay(
    windows: readonly NotificationWindow[],
    slot: number,
    now: DateTime,
    testMode: boolean
  ): number {
    const window = windows[slot - 1];
    if (testMode) {
      return this.computeDelay(window?.start ?? '00:00', window?.end ?? '00:00', now, true);
    }
    if (!window) {
      return 0;
    }
    return this.computeDelay(window.start, window.end, now, false);
  }
}

function wholeSeconds(later: DateTime, earlier: DateTime): number {
  return Math.max(0, Math.floor(later.diff(earlier, 'seconds').seconds));
}
