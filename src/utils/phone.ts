/**
 * Phone number helpers
 */

export function phoneDigits(raw: string): string {
  return raw.replace(/\D/g, '');
}

/**
 * 10-digit numbers become +1 numbers; numbers already written with "+" keep
 * their country code; anything else is passed through as digits.
 */
export function toE164(raw: string): string {
  const digits = phoneDigits(raw);
  if (digits.length === 10) {
    return `+1${digits}`;
  }
  if (raw.trim().startsWith('+')) {
    return `+${digits}`;
  }
  return digits;
}

/**
 * "5551234567" -> "555-123-4567"
 */
export function formatPhoneDisplay(raw: string): string {
  const digits = phoneDigits(raw);
  if (digits.length === 10) {
    return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  return raw;
}
