/**
 * Command dispatch for the `vigil` executable.
 */

import { EXIT_USAGE } from '@vigil/core';
import { check } from './commands/check.js';
import { warmup } from './commands/warmup.js';
import { init } from './commands/init.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';

export const USAGE = `${BOLD}Usage:${RESET} vigil <command> [options]

${BOLD}Commands${RESET}
  check      Probe the service, restart it once if needed, alert on failure
  warmup     Wait for the service, then warm its data path
  init       Write the default configuration file (--force to overwrite)
  help       Show this message

${BOLD}Options${RESET}
  -v, --verbose   Log every probe attempt

${DIM}Configuration: $VIGIL_CONFIG or ~/.vigil/config.json${RESET}`;

export async function main(argv: string[]): Promise<void> {
  const [command, ...args] = argv;

  switch (command) {
    case 'check':
      await check(args);
      return;
    case 'warmup':
      await warmup(args);
      return;
    case 'init':
      await init(args);
      return;
    case 'help':
    case '--help':
    case '-h':
      console.log(USAGE);
      return;
    default:
      console.error(
        command === undefined
          ? `${RED}Missing command.${RESET}`
          : `${RED}Unknown command:${RESET} ${command}`,
      );
      console.error(USAGE);
      process.exitCode = EXIT_USAGE;
  }
}
