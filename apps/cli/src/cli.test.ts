import { describe, it, expect, vi, afterEach } from 'vitest';
import { main, USAGE } from './cli.js';

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('main', () => {
  it('prints usage for help', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await main(['help']);

    expect(logSpy).toHaveBeenCalledWith(USAGE);
    expect(process.exitCode).toBeUndefined();
  });

  it('accepts --help and -h', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await main(['--help']);
    await main(['-h']);

    expect(logSpy).toHaveBeenCalledTimes(2);
  });

  it('exits 2 on an unknown command', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await main(['restart-everything']);

    expect(process.exitCode).toBe(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, '\x1b[31mUnknown command:\x1b[0m restart-everything');
    expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
  });

  it('exits 2 when no command is given', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await main([]);

    expect(process.exitCode).toBe(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, '\x1b[31mMissing command.\x1b[0m');
  });
});
