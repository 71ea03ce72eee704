//NOTE(self): Multi-step remote sequences (create issue, comment on parent, comment on child)
//NOTE(self): Each step may declare an `isDone` check so a re-run skips what already happened
//NOTE(self): The sequence stops at the first failure; completed steps stay done

import { logger } from '@modules/logger.js';
import { describeError } from '@common/errors.js';

export interface Step {
  name: string;
  isDone?: () => Promise<boolean>;
  run: () => Promise<void>;
}

export type StepStatus = 'done' | 'skipped' | 'failed' | 'not-run';

export interface StepReport {
  name: string;
  status: StepStatus;
  error?: string;
}

export interface SequenceReport {
  ok: boolean;
  steps: StepReport[];
  //NOTE(self): First failure message, for one-line summaries
  error?: string;
}

export async function runSteps(steps: Step[]): Promise<SequenceReport> {
  const reports: StepReport[] = [];
  let failure: string | undefined;

  for (const step of steps) {
    if (failure !== undefined) {
      reports.push({ name: step.name, status: 'not-run' });
      continue;
    }

    try {
      if (step.isDone && await step.isDone()) {
        logger.debug('Step already done, skipping', { step: step.name });
        reports.push({ name: step.name, status: 'skipped' });
        continue;
      }

      await step.run();
      reports.push({ name: step.name, status: 'done' });
    } catch (error) {
      failure = `${step.name}: ${describeError(error)}`;
      logger.warn('Step failed', { step: step.name, error: describeError(error) });
      reports.push({ name: step.name, status: 'failed', error: describeError(error) });
    }
  }

  return failure === undefined
    ? { ok: true, steps: reports }
    : { ok: false, steps: reports, error: failure };
}
