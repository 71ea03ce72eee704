//NOTE(self): Shared plumbing for the entry scripts: argument parsing, prompts, startup, error → exit code

import * as readline from 'readline';
import { getConfig, type Config } from '@modules/config.js';
import { initLogger, logger } from '@modules/logger.js';
import { ui } from '@modules/ui.js';
import { isPlanTrackerError, describeError, ValidationError } from '@common/errors.js';
import { IssueNumberSchema, parseOrThrow } from '@common/schemas.js';
import { EXIT_ACTION_NEEDED } from '@common/config.js';

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
}

//NOTE(self): `--name value`, `--name=value` for declared options; any other `--x` is a boolean flag
export function parseCliArgs(argv: string[], valueOptions: readonly string[] = []): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const options = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [rawName, inlineValue] = arg.slice(2).split(/=(.*)/s);
    if (!valueOptions.includes(rawName)) {
      flags.add(rawName);
      continue;
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new ValidationError(`--${rawName} needs a value`);
    }
    if (inlineValue === undefined) i++;
    options.set(rawName, value);
  }

  return { positionals, flags, options };
}

//NOTE(self): Accepts `42` or `#42`
export function parseIssueNumber(value: string | undefined, what: string): number {
  if (value === undefined || !value.trim()) {
    throw new ValidationError(`Missing ${what}`);
  }
  return parseOrThrow(IssueNumberSchema, value.trim().replace(/^#/, ''));
}

export function startup(): Config {
  const config = getConfig();
  initLogger(config.logging.level, config.logging.dir ?? undefined);
  return config;
}

//NOTE(self): Every fatal error exits 2; unexpected ones are logged with their stack
export function reportFailure(error: unknown): number {
  if (isPlanTrackerError(error)) {
    ui.error(error.message);
    logger.error('Command failed', { code: error.code, error: error.message });
  } else {
    ui.error(`Unexpected error: ${describeError(error)}`);
    logger.error('Unexpected error', { error: describeError(error), stack: error instanceof Error ? error.stack : undefined });
  }
  return EXIT_ACTION_NEEDED;
}

//NOTE(self): Runs an entry script's main and exits with its code
export function runMain(main: () => Promise<number>): void {
  main()
    .then(code => process.exit(code))
    .catch(error => process.exit(reportFailure(error)));
}

//NOTE(self): End of input answers '' so Ctrl-D or a closed stdin ends the session like an empty name
export function createAsk(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): { ask: (question: string) => Promise<string>; close: () => void } {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pending: ((answer: string) => void) | null = null;

  rl.on('close', () => {
    closed = true;
    pending?.('');
    pending = null;
  });

  return {
    ask: question => new Promise(resolve => {
      if (closed) {
        resolve('');
        return;
      }
      pending = resolve;
      rl.question(question, answer => {
        pending = null;
        resolve(answer);
      });
    }),
    close: () => rl.close(),
  };
}
