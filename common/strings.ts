//NOTE(self): Shared string utilities used across the codebase
//NOTE(self): createSlug for branch-safe identifiers, isEmpty for blank checks

import { BRANCH_SLUG_MAX_LENGTH } from '@common/config.js';

export function isEmpty(text: string | null | undefined): boolean {
  if (!text) {
    return true;
  }

  return !text.trim();
}

//NOTE(self): Lower-case, every run of non-alphanumerics becomes a single hyphen
export function createSlug(text: string): string {
  if (isEmpty(text)) {
    return 'untitled';
  }

  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+/, '')
    .replace(/-+$/, '');

  if (!slug) {
    return 'untitled';
  }

  return slug.length > BRANCH_SLUG_MAX_LENGTH
    ? slug.slice(0, BRANCH_SLUG_MAX_LENGTH).replace(/-+$/, '')
    : slug;
}

//NOTE(self): Branch name for a plan overview: the issue number keeps it unique
export function createBranchName(issueNumber: number, title: string): string {
  return `${issueNumber}-${createSlug(title)}`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, Math.max(0, maxLength - 1)) + '…';
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
