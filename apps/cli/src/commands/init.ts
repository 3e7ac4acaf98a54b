/**
 * Init command -- write the default configuration file so it can be edited.
 *
 * Refuses to overwrite an existing file unless `--force` is given.
 */

import { EXIT_FAILURE } from '@vigil/core';
import { configExists, getConfigPath, getDefaultConfig, saveConfig } from '../config.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';

export async function init(args: string[]): Promise<void> {
  const path = getConfigPath();

  if (configExists() && !args.includes('--force')) {
    console.error(`${YELLOW}Config already exists:${RESET} ${path}`);
    console.error(`${DIM}Pass --force to overwrite it with the defaults.${RESET}`);
    process.exitCode = EXIT_FAILURE;
    return;
  }

  saveConfig(getDefaultConfig());
  console.log(`${GREEN}${BOLD}Wrote${RESET} ${path}`);
}
