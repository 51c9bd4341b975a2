/**
 * Command-line and environment configuration for the `rite` CLI.
 */

import { z } from 'zod';
import { RiteConfigError } from './errors';

const filePath = (command: string) =>
  z.string({ required_error: `${command} requires a file argument` }).min(1, `${command} requires a file argument`);

/**
 * What the CLI should do
 */
export const Command = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('run'), file: filePath('run') }),
  z.object({ mode: z.literal('eval'), code: z.string({ required_error: '--eval requires a code argument' }) }),
  z.object({ mode: z.literal('repl') }),
  z.object({ mode: z.literal('tokens'), file: filePath('tokens') }),
  z.object({ mode: z.literal('ast'), file: filePath('ast') }),
  z.object({ mode: z.literal('help') }),
]);

/**
 * Settings read from the environment
 */
export const Settings = z.object({
  prompt: z.string().min(1, 'RITE_PROMPT must not be empty').default('> '),
});

export const CliConfig = z.object({
  command: Command,
  settings: Settings,
});

export type CommandT = z.infer<typeof Command>;
export type SettingsT = z.infer<typeof Settings>;
export type CliConfigT = z.infer<typeof CliConfig>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Build a validated configuration from `argv` (without the node and script
 * entries) and environment variables. Throws RiteConfigError on bad input.
 */
export function loadConfig(argv: string[], env: EnvSource = process.env): CliConfigT {
  const raw = {
    command: commandFromArgs(argv),
    settings: { prompt: env.RITE_PROMPT },
  };

  const result = CliConfig.safeParse(raw);
  if (!result.success) {
    throw new RiteConfigError(result.error.issues.map(issue => issue.message).join('; '));
  }
  return result.data;
}

function commandFromArgs(args: string[]): Record<string, unknown> {
  if (args.length === 0) return { mode: 'repl' };

  const [first, ...rest] = args;
  switch (first) {
    case '--help':
    case '-h':
      return { mode: 'help' };
    case 'repl':
      rejectExtra(rest, 0);
      return { mode: 'repl' };
    case '--eval':
    case '-e':
      rejectExtra(rest, 1);
      return { mode: 'eval', code: rest[0] };
    case 'run':
    case 'tokens':
    case 'ast':
      rejectExtra(rest, 1);
      return { mode: first, file: rest[0] };
    default:
      if (first.startsWith('-')) {
        throw new RiteConfigError(`Unknown option: ${first}`);
      }
      // `rite <file>` shorthand
      rejectExtra(rest, 0);
      return { mode: 'run', file: first };
  }
}

function rejectExtra(rest: string[], expected: number): void {
  if (rest.length > expected) {
    throw new RiteConfigError(`Unexpected argument: ${rest[expected]}`);
  }
}
