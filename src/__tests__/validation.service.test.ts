import { describe, it, expect } from 'vitest';

import { DateTooFarError, PastDateError } from '@core/errors/booking.errors.js';
import { ValidationError } from '@core/errors/validation.error.js';

import { ValidationService } from '@services/booking/validation.service.js';

import { fixedClock, testRules, TODAY } from '@test/utils/fixtures.js';

describe('ValidationService', () => {
  const validation = new ValidationService(testRules(), fixedClock());

  it('accepts today and rejects yesterday', () => {
    expect(() => validation.validateDate(TODAY)).not.toThrow();
    expect(() => validation.validateDate('2025-06-09')).toThrow(PastDateError);
  });

  it('accepts up to maxBookingDays ahead', () => {
    expect(() => validation.validateDate('2026-06-10')).not.toThrow();
    expect(() => validation.validateDate('2026-06-11')).toThrow(DateTooFarError);
  });

  it('reports the configured horizon on DateTooFarError', () => {
    const short = new ValidationService(testRules({ maxBookingDays: 7 }), fixedClock());
    try {
      short.validateDate('2025-06-18');
      expect.fail('expected DateTooFarError');
    } catch (err) {
      expect(err).toBeInstanceOf(DateTooFarError);
      if (err instanceof DateTooFarError) expect(err.maxDays).toBe(7);
    }
  });

  it('measures a minimum advance from the start of the day', () => {
    const strict = new ValidationService(testRules({ minAdvanceHours: 24 }), fixedClock());
    expect(() => strict.validateDate('2025-06-11')).toThrow(PastDateError);
    expect(() => strict.validateDate('2025-06-12')).not.toThrow();
  });

  describe('validateRange', () => {
    it('returns every date of a 31-day range', () => {
      const dates = validation.validateRange('2025-07-01', '2025-07-31');
      expect(dates).toHaveLength(31);
      expect(dates[0]).toBe('2025-07-01');
      expect(dates[30]).toBe('2025-07-31');
    });

    it('allows a single-day range', () => {
      expect(validation.validateRange('2025-07-01', '2025-07-01')).toEqual(['2025-07-01']);
    });

    it('rejects ranges longer than 31 dates', () => {
      expect(() => validation.validateRange('2025-07-01', '2025-08-01')).toThrow(ValidationError);
    });

    it('rejects an end before the start', () => {
      expect(() => validation.validateRange('2025-07-02', '2025-07-01')).toThrow(ValidationError);
    });

    it('validates both ends against the calendar', () => {
      expect(() => validation.validateRange('2025-06-09', '2025-06-12')).toThrow(PastDateError);
    });
  });
});
