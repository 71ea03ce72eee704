import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(function () {
    return { messages: { create } };
  }),
}));

import { createAnthropicBodyGenerator, buildGeneratorPrompt } from '@modules/body-generator.js';
import type { Config } from '@modules/config.js';

function config(apiKey: string | null): Config {
  return {
    github: { token: 'test-secret', repo: { owner: 'test-org', repo: 'test-repo' } },
    release: { package: 'example-package', downstream: { owner: 'conda-forge', repo: 'example-package-feedstock' } },
    anthropic: { apiKey, model: 'test-model' },
    logging: { level: 'info', dir: null },
  };
}

const input = { title: 'Add FFT support', priority: 'high', domain: 'physics' } as const;

beforeEach(() => {
  create.mockReset();
});

describe('createAnthropicBodyGenerator', () => {
  it('returns null without an API key', () => {
    expect(createAnthropicBodyGenerator(config(null))).toBeNull();
  });

  it('joins the text blocks of the response', async () => {
    create.mockResolvedValueOnce({
      content: [
        { type: 'text', text: '## Objective\n' },
        { type: 'text', text: 'Add FFT support.\n' },
      ],
      usage: { input_tokens: 10, output_tokens: 20 },
      stop_reason: 'end_turn',
    });

    const generator = createAnthropicBodyGenerator(config('test-secret'));
    const body = await generator?.generate(input);

    expect(body).toBe('## Objective\nAdd FFT support.');
    expect(create).toHaveBeenCalledWith(expect.objectContaining({
      model: 'test-model',
      messages: [{ role: 'user', content: buildGeneratorPrompt(input) }],
    }));
  });

  it('throws on an empty response so the caller can fall back', async () => {
    create.mockResolvedValueOnce({ content: [], usage: { input_tokens: 1, output_tokens: 0 }, stop_reason: 'end_turn' });

    const generator = createAnthropicBodyGenerator(config('test-secret'));

    await expect(generator?.generate(input)).rejects.toThrow('Generator returned an empty body');
  });
});

describe('buildGeneratorPrompt', () => {
  it('lists title, priority and domain', () => {
    expect(buildGeneratorPrompt(input).split('\n').slice(0, 3)).toEqual([
      'Plan title: Add FFT support',
      'Priority: high',
      'Domain: physics',
    ]);
  });
});
