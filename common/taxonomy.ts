//NOTE(self): The fixed label taxonomy — plan entities are told apart by these labels alone
//NOTE(self): Label names are `<prefix>:<value>`; category `plan-type` uses the `plan:` prefix

export const PLAN_TYPES = ['overview', 'phase', 'closeout'] as const;
export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;
export const STATUSES = ['planning', 'in-progress', 'blocked', 'review', 'completed'] as const;
export const DOMAINS = ['physics', 'data', 'plotting', 'testing', 'infrastructure', 'docs'] as const;

export type PlanType = (typeof PLAN_TYPES)[number];
export type Priority = (typeof PRIORITIES)[number];
export type Status = (typeof STATUSES)[number];
export type Domain = (typeof DOMAINS)[number];

export type LabelCategory = 'plan-type' | 'priority' | 'status' | 'domain';

export const CATEGORY_PREFIX: Record<LabelCategory, string> = {
  'plan-type': 'plan',
  priority: 'priority',
  status: 'status',
  domain: 'domain',
};

export interface LabelDefinition {
  category: LabelCategory;
  value: string;
  name: string;
  color: string;
  description: string;
}

function define(category: LabelCategory, value: string, color: string, description: string): LabelDefinition {
  return { category, value, name: `${CATEGORY_PREFIX[category]}:${value}`, color, description };
}

export const LABEL_TAXONOMY: readonly LabelDefinition[] = [
  define('plan-type', 'overview', '0052cc', 'Plan overview'),
  define('plan-type', 'phase', '1d76db', 'Plan phase'),
  define('plan-type', 'closeout', '5319e7', 'Plan closeout record'),

  define('priority', 'critical', 'b60205', 'Critical priority'),
  define('priority', 'high', 'd93f0b', 'High priority'),
  define('priority', 'medium', 'fbca04', 'Medium priority'),
  define('priority', 'low', '0e8a16', 'Low priority'),

  define('status', 'planning', 'c5def5', 'Being planned'),
  define('status', 'in-progress', '1d76db', 'Work in progress'),
  define('status', 'blocked', 'b60205', 'Blocked on something'),
  define('status', 'review', 'fbca04', 'Awaiting review'),
  define('status', 'completed', '0e8a16', 'Completed'),

  define('domain', 'physics', '006b75', 'Physics calculations'),
  define('domain', 'data', '0075ca', 'Data handling'),
  define('domain', 'plotting', 'e99695', 'Plotting and visualization'),
  define('domain', 'testing', 'bfd4f2', 'Tests and coverage'),
  define('domain', 'infrastructure', '5319e7', 'Build, CI and tooling'),
  define('domain', 'docs', 'd4c5f9', 'Documentation'),
];

export function labelName(category: LabelCategory, value: string): string {
  return `${CATEGORY_PREFIX[category]}:${value}`;
}

//NOTE(self): Values of one category present on an entity, e.g. ['blocked'] for status
export function categoryValues(labels: readonly string[], category: LabelCategory): string[] {
  const prefix = `${CATEGORY_PREFIX[category]}:`;
  return labels
    .filter(label => label.startsWith(prefix))
    .map(label => label.slice(prefix.length));
}
