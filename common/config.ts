//NOTE(self): Tunable constants for plan-tracker, in one place
//NOTE(self): Runtime settings (token, repo, keys) come from the environment via modules/config.ts

// ─── GitHub API ─────────────────────────────────────────────────────────────

export const GITHUB_API = 'https://api.github.com';
export const GITHUB_API_VERSION = '2022-11-28';
export const GITHUB_PAGE_SIZE = 100; // one page per query, no pagination
export const GITHUB_MIN_SPACING_MS = 250;
export const GITHUB_LOW_BUDGET_THRESHOLD = 20;
export const GITHUB_MAX_RETRY_AFTER_S = 30; // longer waits are returned to the caller as-is

// ─── Plan Overview ──────────────────────────────────────────────────────────

export const DEFAULT_PRIORITY = 'medium';
export const DEFAULT_DOMAIN = 'infrastructure';
export const BRANCH_SLUG_MAX_LENGTH = 60;

// ─── Phase Linker ───────────────────────────────────────────────────────────

export const QUICK_PHASE_DURATION = 'TBD';
export const QUICK_PHASE_DEPENDENCIES = 'None';
export const BATCH_FIELD_DELIMITER = '|';
export const BATCH_COMMENT_PREFIX = '#';
export const QUICK_NAME_DELIMITER = ',';
export const INTERACTIVE_TERMINATORS = ['done', 'quit', 'exit'];

// ─── Body Generator ─────────────────────────────────────────────────────────

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';
export const GENERATOR_MAX_TOKENS = 1500;

// ─── Release Monitor ────────────────────────────────────────────────────────

export const RELEASE_EARLIEST_EXPECTED_HOURS = 2;
export const RELEASE_LATEST_TYPICAL_HOURS = 6;
export const RELEASE_CRITICAL_HOURS = 12;
export const DEFAULT_RELEASE_PACKAGE = 'example-package';
export const DEFAULT_SHA256 = 'unknown';

// ─── Exit Codes ─────────────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_PENDING = 1;
export const EXIT_ACTION_NEEDED = 2;
