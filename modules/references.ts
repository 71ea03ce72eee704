//NOTE(self): Soft references between plan entities
//NOTE(self): Human-readable `#123` text plus a hidden HTML-comment marker that tools can match exactly
//NOTE(self): The marker is the structured field; the `#123` text is what the search fallback finds

export type ReferenceKind = 'parent' | 'phase' | 'closeout';

export function parentMarker(parentNumber: number): string {
  return `<!-- plan-parent:${parentNumber} -->`;
}

export function referenceMarker(kind: ReferenceKind, targetNumber: number): string {
  return `<!-- plan-ref:${kind}:${targetNumber} -->`;
}

const PARENT_MARKER = /<!--\s*plan-parent:(\d+)\s*-->/;

//NOTE(self): Parent plan number recorded in a child body, if any
export function readParentMarker(body: string): number | null {
  const match = body.match(PARENT_MARKER);
  return match ? parseInt(match[1], 10) : null;
}

export function hasReference(text: string, kind: ReferenceKind, targetNumber: number): boolean {
  return text.includes(referenceMarker(kind, targetNumber));
}

//NOTE(self): `#42` but not `#420` — the textual heuristic used when no marker is present
export function mentionsIssue(text: string, issueNumber: number): boolean {
  return new RegExp(`#${issueNumber}(?!\\d)`).test(text);
}

export function parentLinkComment(parentNumber: number, parentTitle: string): string {
  return [
    `🔗 Part of plan #${parentNumber}: ${parentTitle}`,
    '',
    referenceMarker('parent', parentNumber),
  ].join('\n');
}

export function childLinkComment(kind: 'phase' | 'closeout', childNumber: number, childTitle: string): string {
  const icon = kind === 'phase' ? '📋' : '🏁';
  return [
    `${icon} ${childTitle} → #${childNumber}`,
    '',
    referenceMarker(kind, childNumber),
  ].join('\n');
}
