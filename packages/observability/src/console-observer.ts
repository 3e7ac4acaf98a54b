/**
 * ConsoleObserver: one timestamped line per event on standard output.
 *
 * Line shape: `<ISO timestamp> [<tag>] <message>`. Color is optional and
 * off by default when stdout is not a terminal.
 */

import { LineObserver } from './line-observer.js';
import type { LogLevel, LogLine } from './format.js';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: FG.gray,
  info: '',
  warn: FG.yellow,
  error: `${BOLD}${FG.red}`,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export interface ConsoleObserverOptions {
  logLevel?: LogLevel;
  /** Fixed tag printed on every line. Default: 'vigil'. */
  tag?: string;
  /** Emit ANSI colors. Default: whether stdout is a TTY. */
  color?: boolean;
}

export class ConsoleObserver extends LineObserver {
  private readonly tag: string;
  private readonly color: boolean;

  constructor(options: ConsoleObserverOptions = {}) {
    super(options.logLevel);
    this.tag = options.tag ?? 'vigil';
    this.color = options.color ?? process.stdout.isTTY === true;
  }

  protected write(line: LogLine): void {
    const ts = new Date().toISOString();
    if (!this.color) {
      console.log(`${ts} [${this.tag}] ${line.message}`);
      return;
    }
    const color = LEVEL_COLOR[line.level];
    console.log(
      `${DIM}${ts}${RESET} ${FG.cyan}${BOLD}[${this.tag}]${RESET} ${color}${line.message}${RESET}`,
    );
  }
}
