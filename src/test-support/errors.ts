/** Runs `fn` and returns what it threw; fails the test if nothing was thrown. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
