import { describe, it, expect } from 'vitest';
import { parseIsoTimestamp, hoursBetween, formatDuration } from '@common/time.js';

describe('parseIsoTimestamp', () => {
  it('parses the tracker format', () => {
    expect(parseIsoTimestamp('2024-05-01T12:00:00Z')?.toISOString()).toBe('2024-05-01T12:00:00.000Z');
  });

  it('honours offsets and fractional seconds', () => {
    expect(parseIsoTimestamp('2024-05-01T14:00:00.500+02:00')?.toISOString()).toBe('2024-05-01T12:00:00.500Z');
  });

  it('rejects anything else', () => {
    expect(parseIsoTimestamp('May 1 2024')).toBeNull();
    expect(parseIsoTimestamp('2024-05-01')).toBeNull();
    expect(parseIsoTimestamp('2024-13-45T99:00:00Z')).toBeNull();
  });
});

describe('hoursBetween', () => {
  it('returns fractional hours', () => {
    expect(hoursBetween(new Date('2024-05-01T12:00:00Z'), new Date('2024-05-01T13:30:00Z'))).toBe(1.5);
  });
});

describe('formatDuration', () => {
  it('uses minutes, hours and days', () => {
    expect(formatDuration(0.25)).toBe('15m');
    expect(formatDuration(1.5)).toBe('1h 30m');
    expect(formatDuration(13)).toBe('13h');
    expect(formatDuration(72)).toBe('3.0d');
  });

  it('never prints 60 minutes', () => {
    expect(formatDuration(1.9999)).toBe('2h');
  });
});
