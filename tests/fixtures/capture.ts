/**
 * Run `fn` and return whatever it throws (undefined if it returns).
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
