import {
  TradingCalendar,
  addCalendarDays,
  dateInZone,
  zonedTimeToUtc,
} from './TradingCalendar';
import { TradingCalendarException } from '../exceptions/DomainException';

describe('TradingCalendar', () => {
  const calendar = new TradingCalendar();
  const now = new Date('2025-01-06T18:00:00.000Z');

  describe('earliestFundingTime', () => {
    it('should return now when never funded', () => {
      expect(calendar.earliestFundingTime(now, null)).toBe(now);
    });

    it('should return now when the last funding is more than a day old', () => {
      const last = new Date('2025-01-04T15:30:00.000Z');

      expect(calendar.earliestFundingTime(now, last).toISOString()).toBe(now.toISOString());
    });

    it('should wait a full day after a recent funding', () => {
      const last = new Date('2025-01-06T15:30:00.000Z');

      expect(calendar.earliestFundingTime(now, last).toISOString()).toBe(
        '2025-01-07T15:30:00.000Z',
      );
    });
  });

  describe('calendarWindow', () => {
    it('should use the exchange-local date of the earliest time', () => {
      // 22:00 on the 5th in New York
      const window = calendar.calendarWindow(new Date('2025-01-06T03:00:00.000Z'));

      expect(window).toEqual({ start: '2025-01-05', end: '2025-01-12' });
    });

    it('should honour the timezone and lookahead', () => {
      const window = calendar.calendarWindow(new Date('2025-01-06T03:00:00.000Z'), 'UTC', 3);

      expect(window).toEqual({ start: '2025-01-06', end: '2025-01-09' });
    });
  });

  describe('nextFundingTime', () => {
    it('should fund one hour after the open during standard time', () => {
      const next = calendar.nextFundingTime([
        { date: '2025-01-06', open: '09:30', close: '16:00' },
      ]);

      expect(next.toISOString()).toBe('2025-01-06T15:30:00.000Z');
    });

    it('should fund one hour after the open during daylight saving time', () => {
      const next = calendar.nextFundingTime([
        { date: '2025-07-07', open: '09:30', close: '16:00' },
      ]);

      expect(next.toISOString()).toBe('2025-07-07T14:30:00.000Z');
    });

    it('should pick the earliest session and apply the offset', () => {
      const next = calendar.nextFundingTime(
        [
          { date: '2025-01-08', open: '09:30', close: '16:00' },
          { date: '2025-01-07', open: '09:30', close: '13:00' },
        ],
        15,
      );

      expect(next.toISOString()).toBe('2025-01-07T14:45:00.000Z');
    });

    it('should throw when the window holds no session', () => {
      expect(() => calendar.nextFundingTime([])).toThrow(TradingCalendarException);
      expect(() => calendar.nextFundingTime([])).toThrow(
        'No trading session in the calendar window',
      );
    });
  });

  describe('helpers', () => {
    it('should convert wall-clock times on both sides of the spring switch', () => {
      expect(zonedTimeToUtc('2025-03-07', '09:30', 'America/New_York').toISOString()).toBe(
        '2025-03-07T14:30:00.000Z',
      );
      expect(zonedTimeToUtc('2025-03-10', '09:30', 'America/New_York').toISOString()).toBe(
        '2025-03-10T13:30:00.000Z',
      );
    });

    it('should reject malformed session times', () => {
      expect(() => zonedTimeToUtc('2025-03-07', '9:30am', 'America/New_York')).toThrow(
        'Invalid session date/time: 2025-03-07 9:30am',
      );
    });

    it('should add calendar days across a year boundary', () => {
      expect(addCalendarDays('2025-12-28', 7)).toBe('2026-01-04');
    });

    it('should format dates in the given zone', () => {
      expect(dateInZone(new Date('2025-01-06T03:00:00.000Z'), 'America/New_York')).toBe(
        '2025-01-05',
      );
    });
  });
});
