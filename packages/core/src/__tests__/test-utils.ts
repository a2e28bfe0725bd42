import type { Result } from 'neverthrow';

/**
 * Asserts that a Result is Ok and returns its value. Throws with a descriptive
 * message if the result is an Err, causing the test to fail.
 */
export function assertOk<T, E>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw new Error(`Expected Result to be Ok, but got Err: ${String(result.error)}`);
  }
  return result.value;
}

/**
 * Asserts that a Result is Err and returns its error. Throws with a descriptive
 * message if the result is Ok, causing the test to fail.
 */
export function assertErr<T, E>(result: Result<T, E>): E {
  if (result.isOk()) {
    throw new Error(`Expected Result to be Err, but got Ok: ${String(result.value)}`);
  }
  return result.error;
}
