import { Injectable } from '@nestjs/common';
import { TradingSession } from '../ports/IBrokerageAdapter';
import { TradingCalendarException } from '../exceptions/DomainException';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_MINUTE = 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

export const DEFAULT_EXCHANGE_TIMEZONE = 'America/New_York';

/**
 * Inclusive exchange-local date range, as `YYYY-MM-DD`
 */
export interface CalendarWindow {
  start: string;
  end: string;
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function getPartsInZone(date: Date, timeZone: string): ZonedParts {
  const fmt = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
  const parts = fmt.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? NaN);

  return {
    year: part('year'),
    month: part('month'),
    day: part('day'),
    hour: part('hour') % 24, // some runtimes print midnight as 24
    minute: part('minute'),
    second: part('second'),
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Calendar date of `date` as seen in `timeZone`
 */
export function dateInZone(date: Date, timeZone: string): string {
  const { year, month, day } = getPartsInZone(date, timeZone);
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Add whole calendar days to a `YYYY-MM-DD` string
 */
export function addCalendarDays(date: string, days: number): string {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new TradingCalendarException(`Invalid calendar date: ${date}`, { date });
  }
  const shifted = new Date(
    Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]) + days),
  );
  return shifted.toISOString().slice(0, 10);
}

/**
 * Interpret a wall-clock date and time in `timeZone` and return the UTC instant.
 *
 * The zone offset is read back from Intl at the first guess and again at the
 * corrected instant, which settles wall times near a DST switch.
 */
export function zonedTimeToUtc(date: string, time: string, timeZone: string): Date {
  const dateMatch = DATE_PATTERN.exec(date);
  const timeMatch = TIME_PATTERN.exec(time);
  if (!dateMatch || !timeMatch) {
    throw new TradingCalendarException(`Invalid session date/time: ${date} ${time}`, {
      date,
      time,
    });
  }

  const wallClockAsUtc = Date.UTC(
    Number(dateMatch[1]),
    Number(dateMatch[2]) - 1,
    Number(dateMatch[3]),
    Number(timeMatch[1]),
    Number(timeMatch[2]),
  );

  const offsetAt = (instant: number): number => {
    const p = getPartsInZone(new Date(instant), timeZone);
    return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) - instant;
  };

  let instant = wallClockAsUtc - offsetAt(wallClockAsUtc);
  instant = wallClockAsUtc - offsetAt(instant);

  if (Number.isNaN(instant)) {
    throw new TradingCalendarException(`Cannot resolve ${date} ${time} in ${timeZone}`, {
      date,
      time,
      timeZone,
    });
  }
  return new Date(instant);
}

/**
 * TradingCalendar - Picks the moment of the next funding cycle
 *
 * Funding happens at most once per day, a fixed offset after the open of the
 * first exchange session on or after the earliest allowed time.
 */
@Injectable()
export class TradingCalendar {
  /**
   * now, or one day after the last funding when that is later
   */
  earliestFundingTime(now: Date, lastFundingDate: Date | null): Date {
    if (!lastFundingDate) {
      return now;
    }
    const dayAfter = lastFundingDate.getTime() + MS_PER_DAY;
    return new Date(Math.max(now.getTime(), dayAfter));
  }

  calendarWindow(
    earliest: Date,
    timeZone: string = DEFAULT_EXCHANGE_TIMEZONE,
    lookaheadDays: number = 7,
  ): CalendarWindow {
    const start = dateInZone(earliest, timeZone);
    return { start, end: addCalendarDays(start, lookaheadDays) };
  }

  /**
   * @throws TradingCalendarException when the window holds no session
   */
  nextFundingTime(
    sessions: readonly TradingSession[],
    offsetMinutes: number = 60,
    timeZone: string = DEFAULT_EXCHANGE_TIMEZONE,
  ): Date {
    const first = [...sessions].sort((a, b) => a.date.localeCompare(b.date))[0];
    if (!first) {
      throw new TradingCalendarException('No trading session in the calendar window', {
        sessions: 0,
      });
    }

    const open = zonedTimeToUtc(first.date, first.open, timeZone);
    return new Date(open.getTime() + offsetMinutes * MS_PER_MINUTE);
  }
}
