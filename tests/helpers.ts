/**
 * Shared test helpers.
 */

/** Run `fn` and return what it throws; fails if it does not throw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error to be thrown");
}
