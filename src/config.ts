/**
 * CLI configuration from arguments and environment.
 *
 *   crosscheck [--filter=<expr>] [--color | --no-color] [pattern...]
 *
 * Environment: CROSSCHECK_FILTER (used when no --filter is given), NO_COLOR.
 */

export const DEFAULT_PATTERN = '**/*.test.js';
export const FILTER_ENV = 'CROSSCHECK_FILTER';

export interface CliConfig {
  filter?: string;
  /** undefined = colour when stdout is a terminal. */
  color?: boolean;
  patterns: string[];
}

export function resolveConfig(argv: readonly string[], env: NodeJS.ProcessEnv): CliConfig {
  let filter: string | undefined;
  let color: boolean | undefined;
  const patterns: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--filter=')) {
      filter = arg.slice('--filter='.length);
    } else if (arg === '--filter' && i + 1 < argv.length) {
      filter = argv[++i];
    } else if (arg === '--no-color') {
      color = false;
    } else if (arg === '--color') {
      color = true;
    } else {
      patterns.push(arg);
    }
  }

  if (filter === undefined && env[FILTER_ENV] !== undefined) {
    filter = env[FILTER_ENV];
  }
  if (color === undefined && env.NO_COLOR) {
    color = false;
  }

  return { filter, color, patterns: patterns.length > 0 ? patterns : [DEFAULT_PATTERN] };
}

/** Largest status a process can report without the OS truncating it. */
export const MAX_EXIT_STATUS = 255;

/** Failure count as a process exit status: 0 only when nothing failed. */
export function exitStatus(failures: number): number {
  return Math.min(Math.max(failures, 0), MAX_EXIT_STATUS);
}
