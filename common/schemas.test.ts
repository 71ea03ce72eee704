import { describe, it, expect } from 'vitest';
import {
  PrioritySchema,
  StatusSchema,
  PlanInputSchema,
  PhaseSpecSchema,
  IssueNumberSchema,
  TrackingFieldsSchema,
  parseOrThrow,
} from '@common/schemas.js';
import { ValidationError } from '@common/errors.js';

// ─── Enums ──────────────────────────────────────────────────────────────────

describe('PrioritySchema', () => {
  it('accepts case variants and normalizes to lower case', () => {
    expect(['HIGH', 'High', 'high', ' high '].map(v => PrioritySchema.parse(v))).toEqual(['high', 'high', 'high', 'high']);
  });

  it('names the allowed values when rejecting', () => {
    const result = PrioritySchema.safeParse('urgent');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Unknown priority "urgent" (expected one of: critical, high, medium, low)');
    }
  });
});

describe('StatusSchema', () => {
  it('accepts hyphenated values', () => {
    expect(StatusSchema.parse('In-Progress')).toBe('in-progress');
  });
});

// ─── Plan Overview ──────────────────────────────────────────────────────────

describe('PlanInputSchema', () => {
  it('fills defaults', () => {
    expect(PlanInputSchema.parse({ title: ' Plan ' })).toEqual({ title: 'Plan', priority: 'medium', domain: 'infrastructure' });
  });
});

// ─── Phases ─────────────────────────────────────────────────────────────────

describe('PhaseSpecSchema', () => {
  it('fills placeholders for empty duration and dependencies', () => {
    expect(PhaseSpecSchema.parse({ name: 'Build', duration: ' ', dependencies: '' }))
      .toEqual({ name: 'Build', duration: 'TBD', dependencies: 'None' });
  });

  it('rejects an empty name', () => {
    expect(PhaseSpecSchema.safeParse({ name: '', duration: '', dependencies: '' }).success).toBe(false);
  });
});

describe('IssueNumberSchema', () => {
  it('coerces numeric strings and rejects the rest', () => {
    expect(IssueNumberSchema.parse('42')).toBe(42);
    expect(IssueNumberSchema.safeParse('abc').success).toBe(false);
    expect(IssueNumberSchema.safeParse('0').success).toBe(false);
    expect(IssueNumberSchema.safeParse('1.5').success).toBe(false);
  });
});

// ─── Release Tracking Issue ─────────────────────────────────────────────────

describe('TrackingFieldsSchema', () => {
  it('requires a URL for the source', () => {
    expect(TrackingFieldsSchema.safeParse({ version: '1.0.0', sha256: 'unknown', sourceUrl: 'not a url' }).success).toBe(false);
  });
});

describe('parseOrThrow', () => {
  it('throws a ValidationError carrying the zod message', () => {
    expect(() => parseOrThrow(PlanInputSchema, { title: '' })).toThrow(ValidationError);
    expect(() => parseOrThrow(PlanInputSchema, { title: '' })).toThrow('title: Plan title must not be empty');
  });
});
