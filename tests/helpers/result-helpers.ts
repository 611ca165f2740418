/**
 * Test Helpers for Result Types
 *
 * Unwrap Results in tests, throwing descriptive errors on failure.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 *
 * @example
 * const pier = expectOk(await PierState.asComet(ctx), 'staging comet');
 * expect(pier.zone).toBe('staging');
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(`Expected Ok in ${context}, but got Err:\n${errorJson}`);
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 *
 * @example
 * const error = expectErr(await PierState.tryLoad(ctx, ref), 'loading a locked pier');
 * expect(error.code).toBe('PIER_ALREADY_LOCKED');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    const valueJson = safeJson(result.value);
    throw new Error(`Expected Err in ${context}, but got Ok:\n${valueJson}`);
  }
  return result.error;
}

// Ok values here are often class instances holding cycles (PierState, Ship).
function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}
