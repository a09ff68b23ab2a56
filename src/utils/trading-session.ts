/**
 * Trading Session Filter Utility
 *
 * Determines whether an instant falls within the configured trading window.
 * The window is evaluated in its own time zone; an end before the start
 * crosses midnight.
 */

import type { TradingHoursConfig } from '../config/trade-bot.config';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

export interface ZonedClock {
  /** 0 = Sunday */
  dayOfWeek: number;
  minuteOfDay: number;
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Minutes since midnight for an `HH:MM` string
 */
export function parseClockTime(value: string): number {
  const [hours, minutes] = value.split(':').map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
}

export class TradingSessionFilter {
  private readonly start: number;
  private readonly end: number;
  private readonly days: ReadonlySet<number>;
  private readonly formatter: Intl.DateTimeFormat;

  constructor(private readonly hours: TradingHoursConfig) {
    this.start = parseClockTime(hours.start);
    this.end = parseClockTime(hours.end);
    this.days = new Set(hours.daysOfWeek);
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: hours.timezone,
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23'
    });
  }

  isWithinTradingHours(at: Date): boolean {
    const { dayOfWeek, minuteOfDay } = this.toZonedClock(at);
    if (!this.days.has(dayOfWeek)) {
      return false;
    }

    if (this.end < this.start) {
      return minuteOfDay >= this.start || minuteOfDay <= this.end;
    }
    return minuteOfDay >= this.start && minuteOfDay <= this.end;
  }

  describe(): string {
    return `${this.hours.start}-${this.hours.end} ${this.hours.timezone}`;
  }

  toZonedClock(at: Date): ZonedClock {
    const parts = this.formatter.formatToParts(at);
    const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find(entry => entry.type === type)?.value ?? '';

    return {
      dayOfWeek: WEEKDAYS.indexOf(part('weekday')),
      minuteOfDay: Number(part('hour')) * 60 + Number(part('minute'))
    };
  }
}
