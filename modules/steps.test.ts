import { describe, it, expect, vi } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { runSteps } from '@modules/steps.js';

describe('runSteps', () => {
  it('runs every step in order', async () => {
    const order: string[] = [];
    const report = await runSteps([
      { name: 'one', run: async () => { order.push('one'); } },
      { name: 'two', run: async () => { order.push('two'); } },
    ]);

    expect(order).toEqual(['one', 'two']);
    expect(report).toEqual({
      ok: true,
      steps: [
        { name: 'one', status: 'done' },
        { name: 'two', status: 'done' },
      ],
    });
  });

  it('skips steps whose isDone check passes', async () => {
    const run = vi.fn(async () => {});
    const report = await runSteps([{ name: 'linked', isDone: async () => true, run }]);

    expect(run).not.toHaveBeenCalled();
    expect(report.steps[0].status).toBe('skipped');
  });

  it('stops at the first failure and marks the rest not-run', async () => {
    const after = vi.fn(async () => {});
    const report = await runSteps([
      { name: 'create', run: async () => {} },
      { name: 'comment', run: async () => { throw new Error('403 Forbidden'); } },
      { name: 'reciprocal', run: after },
    ]);

    expect(after).not.toHaveBeenCalled();
    expect(report.ok).toBe(false);
    expect(report.error).toBe('comment: 403 Forbidden');
    expect(report.steps.map(s => s.status)).toEqual(['done', 'failed', 'not-run']);
  });

  it('treats a failing isDone check as a failed step', async () => {
    const report = await runSteps([
      { name: 'check', isDone: async () => { throw new Error('timeout'); }, run: async () => {} },
    ]);

    expect(report.steps).toEqual([{ name: 'check', status: 'failed', error: 'timeout' }]);
  });
});
