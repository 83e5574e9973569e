/**
 * Group items by a string key. Groups keep the order in which their key first
 * appears, and items keep their input order within a group.
 */
export function groupBy<T>(
  data: readonly T[],
  keyFn: (item: T) => string,
): Record<string, T[]> {
  const result: Record<string, T[]> = {};

  for (const item of data) {
    const key = keyFn(item);
    const group = result[key] ?? (result[key] = []);
    group.push(item);
  }

  return result;
}
