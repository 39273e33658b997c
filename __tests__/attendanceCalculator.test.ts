import { describe, expect, it } from '@jest/globals';
import type { AttendanceStatus } from '../src/entities/AttendanceRecord';
import { ValidationError } from '../src/errors';
import { calculateStatus, payableWeight, thresholdProblems } from '../src/services/attendanceCalculator';

const thresholds = { fullDayMinutes: 171, halfDayMinutes: 121 };

const boundaries: [number, AttendanceStatus][] = [
  [0, 'ABSENT'],
  [120, 'ABSENT'],
  [121, 'HALF_DAY'],
  [170, 'HALF_DAY'],
  [171, 'PRESENT'],
  [480, 'PRESENT'],
];

describe('calculateStatus', () => {
  it.each(boundaries)('%i minutes is %s', (minutes, expected) => {
    expect(calculateStatus(minutes, thresholds)).toBe(expected);
  });

  it('rejects negative and fractional minutes', () => {
    expect(() => calculateStatus(-1, thresholds)).toThrow(ValidationError);
    expect(() => calculateStatus(12.5, thresholds)).toThrow(ValidationError);
  });
});

describe('thresholdProblems', () => {
  it('accepts the default thresholds', () => {
    expect(thresholdProblems(thresholds)).toEqual([]);
  });

  it('requires full day above half day', () => {
    expect(thresholdProblems({ fullDayMinutes: 120, halfDayMinutes: 120 })).toEqual([
      'Full day minutes must be greater than half day minutes',
    ]);
  });

  it('rejects a zero half day and a full day longer than a day', () => {
    expect(thresholdProblems({ fullDayMinutes: 1500, halfDayMinutes: 0 })).toEqual([
      'Half day minutes must be greater than zero',
      'Full day minutes cannot exceed 1440',
    ]);
  });
});

describe('payableWeight', () => {
  it('pays half a day for HALF_DAY', () => {
    expect(payableWeight('PRESENT')).toBe(1);
    expect(payableWeight('HALF_DAY')).toBe(0.5);
    expect(payableWeight('ABSENT')).toBe(0);
  });
});
