import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';

import { exitCodeFor, parseArgs } from '../src/cli/options';
import { loadAppConfig } from '../src/config/appConfig';
import { InMemoryAccountDirectory } from '../src/directory/inMemoryDirectory';
import { loadDirectorySeed } from '../src/directory/seed';
import {
  runSession,
  summarizeSlots,
  type SessionIO,
  type SessionResult,
} from '../src/features/replacement';

function printDebugState(result: SessionResult) {
  console.log(chalk.gray(`Session ended: ${result.reason} after ${result.turns} turn(s)`));
  for (const slot of summarizeSlots(result.state)) {
    const mark = slot.resolved ? chalk.green('✔') : chalk.yellow('…');
    console.log(chalk.gray(`${mark} ${slot.label}`));
  }
  console.log(chalk.gray(JSON.stringify(result.state, null, 2)));
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const config = loadAppConfig();
  const seed = await loadDirectorySeed(options.seedPath ?? config.seedPath);
  const directory = new InMemoryAccountDirectory(seed);

  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const io: SessionIO = {
    write(prompt) {
      console.log(chalk.cyan(prompt));
    },
    async read() {
      process.stdout.write(chalk.dim('> '));
      const next = await lines.next();
      return next.done ? null : next.value;
    },
  };

  let result: SessionResult;
  try {
    result = await runSession({
      directory,
      userId: options.userId ?? config.userId,
      io,
      maxTurns: options.maxTurns ?? config.maxTurns,
    });
  } finally {
    rl.close();
  }

  if (options.debug || config.debug) {
    printDebugState(result);
  }
  process.exitCode = exitCodeFor(result);
}

main().catch((error) => {
  console.error(chalk.red('Card replacement session failed'));
  console.error(error);
  process.exitCode = 1;
});
