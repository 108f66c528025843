/**
 * Cartesian product over named dimensions.
 */

/**
 * Enumerate every combination of the given dimensions.
 *
 * Combinations follow dimension insertion order with the last dimension
 * varying fastest. A dimension with no values yields no combinations; no
 * dimensions at all yields the single empty combination.
 */
export function cartesianProduct<T>(
  dimensions: Readonly<Record<string, readonly T[]>>
): Record<string, T>[] {
  let combinations: Record<string, T>[] = [{}];

  for (const [name, values] of Object.entries(dimensions)) {
    const next: Record<string, T>[] = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [name]: value });
      }
    }
    combinations = next;
  }

  return combinations;
}

/**
 * Number of combinations without materializing them.
 */
export function productSize(dimensions: Readonly<Record<string, readonly unknown[]>>): number {
  return Object.values(dimensions).reduce((size, values) => size * values.length, 1);
}
