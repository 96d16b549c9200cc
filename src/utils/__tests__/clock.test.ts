import { fixedClock, toZoned, zonedKey } from '../clock';

describe('clock', () => {
  it('should return the same instant on every call without sharing the Date', () => {
    const clock = fixedClock('2026-03-01T18:00:00Z');
    const first = clock.now();
    first.setUTCFullYear(2000);
    expect(clock.now().toISOString()).toBe('2026-03-01T18:00:00.000Z');
  });

  it('should convert an instant to the local date and time of a zone', () => {
    expect(toZoned(new Date('2026-03-01T18:00:00Z'), 'America/Los_Angeles')).toEqual({
      date: '2026-03-01',
      time: '10:00',
      hour: 10,
    });
  });

  it('should roll the local date back across midnight UTC', () => {
    expect(toZoned(new Date('2026-03-02T06:30:00Z'), 'America/Los_Angeles').date).toBe('2026-03-01');
  });

  it('should follow daylight saving time', () => {
    // DST starts 2026-03-08 in the US
    expect(zonedKey(new Date('2026-03-09T16:00:00Z'), 'America/Los_Angeles')).toBe('2026-03-09 09:00');
  });

  it('should render midnight as 00:00', () => {
    expect(zonedKey(new Date('2026-03-02T08:00:00Z'), 'America/Los_Angeles')).toBe('2026-03-02 00:00');
  });
});
