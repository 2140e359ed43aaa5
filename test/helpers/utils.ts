/**
 * Runs fn and returns what it threw.
 */
export const thrown = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    return e;
  }

  throw new Error("Expected function to throw.");
};
