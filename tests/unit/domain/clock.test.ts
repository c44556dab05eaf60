import { describe, expect, it } from 'vitest';
import { isSameCalendarDate, isValidTimeZone, toCalendarDate } from '../../../src/domain/clock.js';

describe('calendar dates', () => {
  it('formats the local calendar date of an instant', () => {
    const instant = new Date('2024-06-11T02:00:00.000Z');
    expect(toCalendarDate(instant, 'America/Halifax')).toBe('2024-06-10');
    expect(toCalendarDate(instant, 'UTC')).toBe('2024-06-11');
  });

  it('compares instants by local day', () => {
    const morning = new Date('2024-06-10T12:00:00.000Z');
    const lateEvening = new Date('2024-06-11T02:30:00.000Z');
    expect(isSameCalendarDate(morning, lateEvening, 'America/Halifax')).toBe(true);
    expect(isSameCalendarDate(morning, lateEvening, 'UTC')).toBe(false);
  });

  it('validates IANA time zone names', () => {
    expect(isValidTimeZone('America/Halifax')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });
});
