import { DateTime } from 'luxon';
import { ValidationError } from '../../domain/errors/ValidationError';

const CLOCK_TIME_PATTERN = /^(\d{2}):(\d{2})$/;

/**
 * ClockTime value object
 * Wall-clock time of day in "HH:MM" form (00:00 - 23:59), no date and no zone
 */
export class ClockTime {
  private constructor(
    public readonly hour: number,
    public readonly minute: number
  ) {}

  /**
   * Parses "HH:MM"; throws ValidationError on any other shape or out-of-range value
   */
  public static parse(value: string): ClockTime {
    const match = CLOCK_TIME_PATTERN.exec(value.trim());
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new ValidationError(`Invalid clock time: '${value}'. Expected HH:MM.`, value);
    }

    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);
    if (hour > 23 || minute > 59) {
      throw new ValidationError(`Invalid clock time: '${value}'. Hour must be 00-23, minute 00-59.`, value);
    }

    return new ClockTime(hour, minute);
  }

  /**
   * Validates if a string is a valid "HH:MM" clock time
   */
  public static isValid(value: string): boolean {
    try {
      ClockTime.parse(value);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Same clock time on the calendar day (and in the zone) of `day`
   */
  public on(day: DateTime): DateTime {
    return day.set({ hour: this.hour, minute: this.minute, second: 0, millisecond: 0 });
  }

  public minutesOfDay(): number {
    return this.hour * 60 + this.minute;
  }

  public isBefore(other: ClockTime): boolean {
    return this.minutesOfDay() < other.minutesOfDay();
  }

  public toString(): string {
    return `${String(this.hour).padStart(2, '0')}:${String(this.minute).padStart(2, '0')}`;
  }
}
