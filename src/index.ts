#!/usr/bin/env node

import { CliError, USAGE, parseCli } from './cli.js';
import type { CliOptions } from './cli.js';

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  if (options.command === 'help') {
    console.log(USAGE);
    return;
  }

  const { runCommand } = await import('./app.js');
  await runCommand(options);
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
