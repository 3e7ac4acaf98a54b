/**
 * Thin promise wrapper over child_process.execFile.
 *
 * A non-zero exit is a normal result (systemctl and fuser use exit codes
 * as answers); only a spawn failure or a timeout rejects.
 */

import { execFile } from 'node:child_process';
import { CommandError } from '../errors/index.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs: number;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (file, args, options) => {
  const display = [file, ...args].join(' ');

  return new Promise<CommandResult>((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: options.timeoutMs, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        if (error.killed) {
          reject(
            new CommandError(`"${display}" timed out after ${options.timeoutMs}ms`, display, {
              signal: error.signal,
            }),
          );
          return;
        }

        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }

        reject(
          new CommandError(`"${display}" could not be run: ${error.message}`, display, {
            code: error.code,
            signal: error.signal,
          }),
        );
      },
    );
  });
};
