import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';

/**
 * Deletion-time arithmetic and display, always in an explicit timezone.
 */
export class TimeParser {
  /**
   * Last second of the day `days` after `now`, in `timezone`.
   * Deletions land at 23:59:59 so a container gets the whole final day.
   */
  static endOfDayAfter(now: Date, days: number, timezone: string = 'UTC'): Date {
    return DateTime.fromJSDate(now)
      .setZone(timezone)
      .plus({ days })
      .set({ hour: 23, minute: 59, second: 59, millisecond: 0 })
      .toJSDate();
  }

  /**
   * Parse a natural language deletion time ("in 5 days", "on friday",
   * "2026-11-02 18:00"). A phrase without a time of day resolves to the end
   * of that day. Returns null when nothing could be parsed.
   */
  static parseNatural(text: string, reference: Date, timezone: string = 'UTC'): Date | null {
    const iso = this.parseISO(text, timezone);
    if (iso) {
      return iso;
    }

    const [result] = chrono.parse(text, reference, { forwardDate: true });
    if (!result) {
      return null;
    }

    const parsed = DateTime.fromJSDate(result.start.date()).setZone(timezone);
    if (result.start.isCertain('hour')) {
      return parsed.toJSDate();
    }
    return parsed.set({ hour: 23, minute: 59, second: 59, millisecond: 0 }).toJSDate();
  }

  static parseISO(iso: string, timezone: string = 'UTC'): Date | null {
    const trimmed = iso.trim();
    const dt = DateTime.fromISO(trimmed, { zone: timezone });
    if (dt.isValid) {
      return dt.toJSDate();
    }
    const sqlDt = DateTime.fromSQL(trimmed, { zone: timezone });
    if (sqlDt.isValid) {
      return sqlDt.toJSDate();
    }
    return null;
  }

  /** e.g. "2026-10-21 23:59 UTC" */
  static format(date: Date, timezone: string = 'UTC'): string {
    return DateTime.fromJSDate(date).setZone(timezone).toFormat('yyyy-MM-dd HH:mm ZZZZ');
  }

  static isValidTimezone(timezone: string): boolean {
    return DateTime.now().setZone(timezone).isValid;
  }
}
