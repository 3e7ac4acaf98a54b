/**
 * SystemdProcessControl: IProcessControl backed by systemctl and fuser.
 */

import { CommandError, ConfigError, runCommand } from '@vigil/core';
import type { CommandRunner, IProcessControl } from '@vigil/core';

export type SystemdScope = 'user' | 'system';

export interface SystemdProcessControlOptions {
  /** `user` adds --user to every systemctl call. Default: user. */
  scope?: SystemdScope;
  systemctlPath?: string;
  fuserPath?: string;
  runner?: CommandRunner;
}

export class SystemdProcessControl implements IProcessControl {
  private readonly scope: SystemdScope;
  private readonly systemctlPath: string;
  private readonly fuserPath: string;
  private readonly runner: CommandRunner;

  constructor(options: SystemdProcessControlOptions = {}) {
    this.scope = options.scope ?? 'user';
    this.systemctlPath = options.systemctlPath ?? 'systemctl';
    this.fuserPath = options.fuserPath ?? 'fuser';
    this.runner = options.runner ?? runCommand;
  }

  async isActive(unit: string, timeoutMs: number): Promise<boolean> {
    // --quiet: exit 0 only for "active"; activating/failed/unknown are non-zero.
    const result = await this.runner(
      this.systemctlPath,
      this.systemctlArgs('is-active', '--quiet', unit),
      { timeoutMs },
    );
    return result.exitCode === 0;
  }

  async restart(unit: string, timeoutMs: number): Promise<void> {
    const args = this.systemctlArgs('restart', unit);
    const result = await this.runner(this.systemctlPath, args, { timeoutMs });
    if (result.exitCode !== 0) {
      const command = [this.systemctlPath, ...args].join(' ');
      throw new CommandError(
        `"${command}" exited with code ${result.exitCode}${describeStderr(result.stderr)}`,
        command,
        { exitCode: result.exitCode },
      );
    }
  }

  async freePort(port: number, timeoutMs: number): Promise<void> {
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      throw new ConfigError(`Invalid TCP port: ${port}`, { port });
    }

    const args = ['-k', `${port}/tcp`];
    const result = await this.runner(this.fuserPath, args, { timeoutMs });
    // fuser exits 1 when nothing holds the port.
    if (result.exitCode > 1) {
      const command = [this.fuserPath, ...args].join(' ');
      throw new CommandError(
        `"${command}" exited with code ${result.exitCode}${describeStderr(result.stderr)}`,
        command,
        { exitCode: result.exitCode },
      );
    }
  }

  private systemctlArgs(...args: string[]): string[] {
    return this.scope === 'user' ? ['--user', ...args] : args;
  }
}

function describeStderr(stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed.length > 0 ? `: ${trimmed}` : '';
}
