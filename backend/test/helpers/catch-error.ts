/**
 * Returns what `fn` throws, so tests can assert on the error's fields.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
