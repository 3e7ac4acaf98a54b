/**
 * Time source used for every pause and deadline.
 *
 * Production code gets the wall clock; tests swap in the virtual clock from
 * `@vigil/core/testing` so a 120-second warm-up deadline runs instantly.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise<void>((resolve) => {
      if (ms <= 0) {
        resolve();
        return;
      }
      setTimeout(resolve, ms);
    }),
};
