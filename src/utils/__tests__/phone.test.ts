import { formatPhoneDisplay, phoneDigits, toE164 } from '../phone';

describe('phone', () => {
  it('should strip everything but digits', () => {
    expect(phoneDigits('(555) 123-4567')).toBe('5551234567');
  });

  it('should add the +1 country code to 10-digit numbers', () => {
    expect(toE164('555-123-4567')).toBe('+15551234567');
  });

  it('should keep an explicit country code', () => {
    expect(toE164('+44 20 7946 0000')).toBe('+442079460000');
  });

  it('should pass other numbers through as digits', () => {
    expect(toE164('15551234567')).toBe('15551234567');
  });

  it('should format 10-digit numbers for display', () => {
    expect(formatPhoneDisplay('5551234567')).toBe('555-123-4567');
    expect(formatPhoneDisplay('+442079460000')).toBe('+442079460000');
  });
});
