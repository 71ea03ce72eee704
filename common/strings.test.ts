import { describe, it, expect } from 'vitest';
import { isEmpty, createSlug, createBranchName, truncate, pluralize } from '@common/strings.js';

// ---------------------------------------------------------------------------
// isEmpty
// ---------------------------------------------------------------------------
describe('isEmpty', () => {
  it('returns true for null', () => {
    expect(isEmpty(null)).toBe(true);
  });

  it('returns true for undefined', () => {
    expect(isEmpty(undefined)).toBe(true);
  });

  it('returns true for whitespace-only strings', () => {
    expect(isEmpty('  \n\t ')).toBe(true);
  });

  it('returns false for text', () => {
    expect(isEmpty(' a ')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// createSlug
// ---------------------------------------------------------------------------
describe('createSlug', () => {
  it('lower-cases and collapses every non-alphanumeric run into one hyphen', () => {
    expect(createSlug('Add FFT -- Support (v2)!')).toBe('add-fft-support-v2');
  });

  it('trims edge hyphens', () => {
    expect(createSlug('  ...Refactor loaders...  ')).toBe('refactor-loaders');
  });

  it('caps long slugs at 60 characters without a trailing hyphen', () => {
    const slug = createSlug(`${'a'.repeat(59)} bcd`);
    expect(slug).toBe('a'.repeat(59));
    expect(createSlug('x'.repeat(80))).toHaveLength(60);
  });

  it('falls back to untitled when nothing alphanumeric is left', () => {
    expect(createSlug('!!!')).toBe('untitled');
    expect(createSlug('')).toBe('untitled');
  });

  it('caps the length without leaving a trailing hyphen', () => {
    const slug = createSlug(`${'a'.repeat(59)} bcd`);
    expect(slug).toBe('a'.repeat(59));
  });
});

describe('createBranchName', () => {
  it('prefixes the slug with the issue number', () => {
    expect(createBranchName(123, 'Fix Plasma Moments')).toBe('123-fix-plasma-moments');
  });
});

describe('truncate', () => {
  it('leaves short text alone and ellipsizes long text', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghij', 5)).toBe('abcd…');
  });
});

describe('pluralize', () => {
  it('picks the form by count', () => {
    expect(pluralize(1, 'phase')).toBe('1 phase');
    expect(pluralize(3, 'phase')).toBe('3 phases');
  });
});
