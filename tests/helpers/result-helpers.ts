/**
 * Test helpers for Result types.
 *
 * Unwrap Results in tests, throwing descriptive errors on the unexpected
 * branch so assertion failures show the whole payload.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap the Ok value, throw if Err.
 *
 * @example
 * const manifest = expectOk(await catalog.load(project, '1.0.0'), 'loading manifest');
 * expect(manifest.version).toBe('1.0.0');
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(`Expected Ok in ${context}, but got Err:\n${errorJson}`);
  }
  return result.value;
}

/**
 * Unwrap the Err value, throw if Ok.
 *
 * @example
 * const error = expectErr(await catalog.load(project, '9.9.9'), 'loading unknown version');
 * expect(error._tag).toBe('NotFound');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    const valueJson = JSON.stringify(result.value, null, 2);
    throw new Error(`Expected Err in ${context}, but got Ok:\n${valueJson}`);
  }
  return result.error;
}
