import { describe, it, expect } from 'vitest';

import { formatPhoneForDisplay, normalizePhone } from '@utils/phone.js';
import { sanitizeInput, sanitizeName } from '@utils/sanitize.js';
import { addDays, dayKeysBetween, formatDayKey, msUntilNext, parseClockTime, parseDisplayDate } from '@utils/time.js';

import { fixedClock, TZ } from '@test/utils/fixtures.js';

describe('normalizePhone', () => {
  it('reduces the accepted spellings to 7XXXXXXXXXX', () => {
    expect(normalizePhone('+7 (999) 123-45-67')).toBe('79991234567');
    expect(normalizePhone('8 999 123 45 67')).toBe('79991234567');
    expect(normalizePhone('9991234567')).toBe('79991234567');
  });

  it('is idempotent', () => {
    const once = normalizePhone('8(999)123-45-67');
    expect(normalizePhone(once)).toBe(once);
  });

  it('rejects numbers of the wrong length or country', () => {
    expect(normalizePhone('12345')).toBe('');
    expect(normalizePhone('19991234567')).toBe('');
  });

  it('formats stored numbers for display', () => {
    expect(formatPhoneForDisplay('79991234567')).toBe('+7 (999) 123-45-67');
  });
});

describe('sanitize', () => {
  it('escapes markup and collapses whitespace', () => {
    expect(sanitizeInput('  <b>Иван</b>\n\n  Петров ')).toBe('&lt;b&gt;Иван&lt;/b&gt; Петров');
  });

  it('bounds names to 2..150 characters', () => {
    expect(sanitizeName(' И ')).toBeNull();
    expect(sanitizeName('Ян')).toBe('Ян');
    expect(sanitizeName('a'.repeat(151))).toBeNull();
  });
});

describe('time helpers', () => {
  it('parses dd.MM.yyyy into day keys', () => {
    expect(parseDisplayDate('05.01.2026', TZ)).toBe('2026-01-05');
    expect(parseDisplayDate('2026-01-05', TZ)).toBeNull();
    expect(parseDisplayDate('31.02.2026', TZ)).toBeNull();
  });

  it('walks day keys across a month end', () => {
    expect(dayKeysBetween('2025-06-29', '2025-07-02', TZ)).toEqual([
      '2025-06-29',
      '2025-06-30',
      '2025-07-01',
      '2025-07-02',
    ]);
    expect(addDays('2025-12-31', 1, TZ)).toBe('2026-01-01');
    expect(formatDayKey('2025-12-31')).toBe('31.12.2025');
  });

  it('schedules the next HH:MM strictly in the future', () => {
    const clock = fixedClock(new Date('2025-06-10T09:00:00Z'));
    expect(parseClockTime('25:00')).toBeNull();
    expect(msUntilNext({ hour: 13, minute: 0 }, TZ, clock)).toBe(60 * 60 * 1000);
    expect(msUntilNext({ hour: 12, minute: 0 }, TZ, clock)).toBe(24 * 60 * 60 * 1000);
  });
});
