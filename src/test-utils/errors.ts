/**
 * Helpers for asserting on thrown registry errors.
 */

/** Run `fn` and return what it throws. Fails the test if nothing is thrown. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
