import type { SessionResult } from '../features/replacement';

export interface CliOptions {
  userId?: string;
  seedPath?: string;
  maxTurns?: number;
  debug: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { debug: false };
  for (const arg of argv) {
    if (arg === '--debug') {
      options.debug = true;
    } else if (arg.startsWith('--user=')) {
      const value = arg.slice('--user='.length).trim();
      if (value) {
        options.userId = value;
      }
    } else if (arg.startsWith('--seed=')) {
      const value = arg.slice('--seed='.length).trim();
      if (value) {
        options.seedPath = value;
      }
    } else if (arg.startsWith('--max-turns=')) {
      const value = Number(arg.split('=')[1]);
      if (Number.isInteger(value) && value > 0) {
        options.maxTurns = value;
      }
    }
  }
  return options;
}

export function exitCodeFor(result: SessionResult): number {
  return result.reason === 'completed' || result.reason === 'cancelled' ? 0 : 1;
}
