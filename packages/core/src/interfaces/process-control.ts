/**
 * IProcessControl: process manager contract
 *
 * The three disruptive or privileged operations the supervisor needs from
 * the host. Implemented against systemd and fuser; faked in tests.
 */

export interface IProcessControl {
  /** Resolves true only when the unit reports exactly "active". */
  isActive(unit: string, timeoutMs: number): Promise<boolean>;
  /** Rejects with a CommandError when the restart command fails. */
  restart(unit: string, timeoutMs: number): Promise<void>;
  /** Kill whatever is bound to the TCP port. A free port is not an error. */
  freePort(port: number, timeoutMs: number): Promise<void>;
}
