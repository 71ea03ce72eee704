//NOTE(self): Pluggable plan body generation
//NOTE(self): The Anthropic-backed generator drafts the overview body; without a key there is no generator
//NOTE(self): and the overview manager falls back to the template

import Anthropic from '@anthropic-ai/sdk';
import type { Config } from '@modules/config.js';
import type { PlanInput } from '@common/schemas.js';
import { GENERATOR_MAX_TOKENS } from '@common/config.js';
import { logger } from '@modules/logger.js';

export interface BodyGenerator {
  readonly name: string;
  generate(input: PlanInput): Promise<string>;
}

const SYSTEM_PROMPT = [
  'You write GitHub issue bodies for plan overviews in a software project.',
  'Respond with GitHub-flavored markdown only, no preamble.',
  'Use these sections in order: "## Objective", "## Context", "## Proposed Phases", "## Acceptance Criteria", "## Risks".',
  'Acceptance criteria are a markdown checklist. Keep the whole body under 400 words.',
].join('\n');

export function buildGeneratorPrompt(input: PlanInput): string {
  return [
    `Plan title: ${input.title}`,
    `Priority: ${input.priority}`,
    `Domain: ${input.domain}`,
    '',
    'Draft the plan overview body.',
  ].join('\n');
}

//NOTE(self): Lazy-initialized SDK client, one per generator
export function createAnthropicBodyGenerator(config: Config): BodyGenerator | null {
  const { apiKey, model } = config.anthropic;
  if (!apiKey) {
    logger.debug('ANTHROPIC_API_KEY not set, no body generator');
    return null;
  }

  let client: Anthropic | null = null;

  return {
    name: `anthropic:${model}`,

    async generate(input) {
      if (!client) {
        client = new Anthropic({ apiKey });
      }

      const response = await client.messages.create({
        model,
        max_tokens: GENERATOR_MAX_TOKENS,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildGeneratorPrompt(input) }],
      });

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      logger.debug('Body generator response', {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason,
      });

      if (!text.trim()) {
        throw new Error('Generator returned an empty body');
      }
      return text.trim();
    },
  };
}
