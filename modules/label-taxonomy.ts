//NOTE(self): Label Taxonomy Provisioner
//NOTE(self): Creates every canonical label; an existing label counts as success
//NOTE(self): Any other failure stops the run at that label — nothing is rolled back, re-running finishes the job

import type { Tracker } from '@modules/tracker.js';
import { logger } from '@modules/logger.js';
import { LABEL_TAXONOMY, type LabelDefinition } from '@common/taxonomy.js';

export type LabelOutcome = 'created' | 'existing' | 'failed';

export interface LabelReportEntry {
  label: string;
  outcome: LabelOutcome;
  error?: string;
}

export interface ProvisionReport {
  entries: LabelReportEntry[];
  created: number;
  existing: number;
  failed: number;
  //NOTE(self): Set when the run stopped early; names the offending label
  abortedAt: string | null;
}

export async function provisionLabels(
  tracker: Tracker,
  taxonomy: readonly LabelDefinition[] = LABEL_TAXONOMY
): Promise<ProvisionReport> {
  const entries: LabelReportEntry[] = [];
  let abortedAt: string | null = null;

  for (const label of taxonomy) {
    const result = await tracker.createLabel(label);

    if (!result.success) {
      logger.error('Label creation failed, aborting', { label: label.name, error: result.error });
      entries.push({ label: label.name, outcome: 'failed', error: result.error });
      abortedAt = label.name;
      break;
    }

    logger.debug('Label provisioned', { label: label.name, outcome: result.data });
    entries.push({ label: label.name, outcome: result.data });
  }

  return {
    entries,
    created: entries.filter(e => e.outcome === 'created').length,
    existing: entries.filter(e => e.outcome === 'existing').length,
    failed: entries.filter(e => e.outcome === 'failed').length,
    abortedAt,
  };
}
