import { checkBookingWindow, earliestBookableDate } from '../bookingWindow';

const policy = { timezone: 'America/Los_Angeles', cutoffHour: 22 };

describe('bookingWindow', () => {
  it('should open tomorrow during the day', () => {
    expect(earliestBookableDate(new Date('2026-03-01T18:00:00Z'), policy)).toBe('2026-03-02');
  });

  it('should skip tomorrow after the cut-off hour', () => {
    expect(earliestBookableDate(new Date('2026-03-02T06:00:00Z'), policy)).toBe('2026-03-03');
  });

  it('should use the local date, not the UTC one', () => {
    // 2026-03-02 02:00 UTC is still Sunday evening locally
    expect(earliestBookableDate(new Date('2026-03-02T02:00:00Z'), policy)).toBe('2026-03-02');
  });

  it('should allow dates from the earliest onwards', () => {
    const now = new Date('2026-03-01T18:00:00Z');
    expect(checkBookingWindow('2026-03-02', now, policy)).toEqual({ allowed: true, earliest: '2026-03-02' });
    expect(checkBookingWindow('2026-04-15', now, policy).allowed).toBe(true);
  });

  it('should explain past and same-day dates', () => {
    expect(checkBookingWindow('2026-02-27', new Date('2026-03-01T18:00:00Z'), policy)).toEqual({
      allowed: false,
      earliest: '2026-03-02',
      message: 'Same-day bookings are not available. Earliest available date is March 2, 2026.',
    });
  });
});
