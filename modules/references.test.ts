import { describe, it, expect } from 'vitest';
import {
  parentMarker,
  readParentMarker,
  hasReference,
  mentionsIssue,
  parentLinkComment,
  childLinkComment,
} from '@modules/references.js';

describe('parent marker', () => {
  it('reads back what it writes', () => {
    expect(readParentMarker(`Body text\n\n${parentMarker(42)}`)).toBe(42);
  });

  it('returns null without a marker', () => {
    expect(readParentMarker('Part of #42')).toBeNull();
  });
});

describe('link comments', () => {
  it('name the other issue and carry a marker', () => {
    expect(childLinkComment('phase', 43, 'Phase 1: Setup')).toBe('📋 Phase 1: Setup → #43\n\n<!-- plan-ref:phase:43 -->');
    expect(parentLinkComment(42, 'Parent plan')).toBe('🔗 Part of plan #42: Parent plan\n\n<!-- plan-ref:parent:42 -->');
  });

  it('are recognised by hasReference', () => {
    expect(hasReference(childLinkComment('closeout', 9, 'Closeout: x'), 'closeout', 9)).toBe(true);
    expect(hasReference(childLinkComment('closeout', 9, 'Closeout: x'), 'phase', 9)).toBe(false);
  });
});

describe('mentionsIssue', () => {
  it('matches #N but not a longer number', () => {
    expect(mentionsIssue('see #5.', 5)).toBe(true);
    expect(mentionsIssue('see #50', 5)).toBe(false);
  });
});
