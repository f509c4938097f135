import { describe, it, expect } from 'vitest';
import {
  createScheduleWindow,
  parseGmtOffset,
  parseTimeOfDay,
  parseWorkDays,
} from './ScheduleWindow.js';
import { ConfigError } from '../errors.js';

describe('parseWorkDays', () => {
  it('should default to monday through friday', () => {
    expect(parseWorkDays(undefined)).toEqual(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']);
    expect(parseWorkDays('  ')).toEqual(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']);
  });

  it('should parse names case-insensitively and trim whitespace', () => {
    expect(parseWorkDays('Monday, WEDNESDAY ,friday')).toEqual(['monday', 'wednesday', 'friday']);
  });

  it('should accept three-letter abbreviations and drop duplicates', () => {
    expect(parseWorkDays('sat,sun,saturday')).toEqual(['saturday', 'sunday']);
  });

  it('should reject unknown day names', () => {
    expect(() => parseWorkDays('monday,funday')).toThrow(ConfigError);
    expect(() => parseWorkDays('monday,funday')).toThrow('Invalid work day: funday');
  });

  it('should return an empty list when only separators are given', () => {
    expect(parseWorkDays(', ,')).toEqual([]);
  });
});

describe('parseTimeOfDay', () => {
  it('should parse HH:MM', () => {
    expect(parseTimeOfDay('09:30')).toEqual({ hours: 9, minutes: 30 });
    expect(parseTimeOfDay('7:05')).toEqual({ hours: 7, minutes: 5 });
  });

  it('should reject malformed or out of range values', () => {
    expect(() => parseTimeOfDay('9')).toThrow(ConfigError);
    expect(() => parseTimeOfDay('24:00')).toThrow(ConfigError);
    expect(() => parseTimeOfDay('12:60')).toThrow(ConfigError);
    expect(() => parseTimeOfDay('ab:cd')).toThrow('Invalid time format: ab:cd (expected HH:MM)');
  });
});

describe('parseGmtOffset', () => {
  it('should default to zero', () => {
    expect(parseGmtOffset(undefined)).toBe(0);
    expect(parseGmtOffset('')).toBe(0);
  });

  it('should parse signed integers with an optional prefix', () => {
    expect(parseGmtOffset('2')).toBe(2);
    expect(parseGmtOffset('-5')).toBe(-5);
    expect(parseGmtOffset('GMT+3')).toBe(3);
    expect(parseGmtOffset('utc-11')).toBe(-11);
  });

  it('should reject offsets outside [-23, 23]', () => {
    expect(() => parseGmtOffset('24')).toThrow(ConfigError);
    expect(() => parseGmtOffset('-24')).toThrow(ConfigError);
  });

  it('should reject non numeric offsets', () => {
    expect(() => parseGmtOffset('GMT+2.5')).toThrow('Invalid GMT offset: GMT+2.5');
  });
});

describe('createScheduleWindow', () => {
  const start = { hours: 9, minutes: 0 };
  const end = { hours: 17, minutes: 0 };

  it('should build a frozen window', () => {
    const window = createScheduleWindow({ workDays: ['monday'], start, end, offsetHours: 1 });

    expect([...window.workDays]).toEqual(['monday']);
    expect(window.start).toEqual(start);
    expect(window.offsetHours).toBe(1);
    expect(Object.isFrozen(window)).toBe(true);
  });

  it('should reject an empty work-day set', () => {
    expect(() => createScheduleWindow({ workDays: [], start, end, offsetHours: 0 })).toThrow(
      'At least one work day must be configured'
    );
  });

  it('should reject windows that do not end after they start', () => {
    expect(() =>
      createScheduleWindow({ workDays: ['monday'], start: end, end: start, offsetHours: 0 })
    ).toThrow('Work start (17:00) must be before work end (09:00)');
    expect(() =>
      createScheduleWindow({ workDays: ['monday'], start, end: start, offsetHours: 0 })
    ).toThrow(ConfigError);
  });

  it('should reject out of range offsets', () => {
    expect(() => createScheduleWindow({ workDays: ['monday'], start, end, offsetHours: 30 })).toThrow(
      ConfigError
    );
  });
});
