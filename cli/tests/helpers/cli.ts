/**
 * Harness for driving commander programs in-process.
 */

import { vi } from 'vitest';

/** Thrown in place of exiting so a test can observe the exit code. */
export class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
    this.name = 'ExitCalled';
  }
}

/** Replace process.exit and silence console output for one test. */
export function stubProcess() {
  const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new ExitCalled(code);
  });
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  return { exit, log, error };
}

/** Everything written through a console spy, one string per call. */
export function printed(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => args.map(String).join(' '));
}
