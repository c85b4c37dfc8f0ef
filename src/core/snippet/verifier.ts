import type { ParameterDiscrepancy } from './types.js';

function difference(from: Iterable<string>, remove: ReadonlySet<string>): Set<string> {
  const result = new Set<string>();
  for (const name of from) {
    if (!remove.has(name)) {
      result.add(name);
    }
  }
  return result;
}

/**
 * Compare documented and actual parameter names in both directions.
 * `undocumented` follows the order of `actual`, `missing` the order of `expected`.
 */
export function computeParameterDiscrepancy(
  expected: ReadonlySet<string>,
  actual: ReadonlySet<string>
): ParameterDiscrepancy {
  return {
    undocumented: difference(actual, expected),
    missing: difference(expected, actual),
  };
}

export function hasDiscrepancy(discrepancy: ParameterDiscrepancy): boolean {
  return discrepancy.undocumented.size > 0 || discrepancy.missing.size > 0;
}

export function sameNames(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const name of a) {
    if (!b.has(name)) return false;
  }
  return true;
}
