// Surrogate IDs and human-key lookups over the document collections.
// Linear scans: the collections are small and insertion order is the tie-break.

export function nextId<K extends string>(collection: readonly Record<K, number>[], idField: K): number {
  let max = 0;
  for (const item of collection) {
    const id = item[idField];
    if (Number.isFinite(id) && id > max) max = id;
  }
  return max + 1;
}

export function findBy<T, K extends keyof T>(collection: readonly T[], field: K, value: T[K]): T | undefined {
  return collection.find((item) => item[field] === value);
}

export function filterBy<T, K extends keyof T>(collection: readonly T[], field: K, value: T[K]): T[] {
  return collection.filter((item) => item[field] === value);
}
