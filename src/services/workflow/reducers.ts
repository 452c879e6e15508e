/**
 * Associative merge operations for reducer fields.
 */

export type Reducer<T> = (current: T, incoming: T) => T;

export function concat<T>(): Reducer<T[]> {
  return (current, incoming) => [...current, ...incoming];
}

/** Set-like union; keeps the first occurrence of each value in order. */
export function union<T>(): Reducer<T[]> {
  return (current, incoming) => {
    const seen = new Set(current);
    const merged = [...current];
    for (const item of incoming) {
      if (!seen.has(item)) {
        seen.add(item);
        merged.push(item);
      }
    }
    return merged;
  };
}

/** Append, dropping items whose key has already been seen. */
export function uniqueBy<T>(key: (item: T) => string): Reducer<T[]> {
  return (current, incoming) => {
    const seen = new Set(current.map(key));
    const merged = [...current];
    for (const item of incoming) {
      const k = key(item);
      if (!seen.has(k)) {
        seen.add(k);
        merged.push(item);
      }
    }
    return merged;
  };
}

/** Append new keys; an item whose key is already present replaces it in place. */
export function upsertBy<T>(key: (item: T) => string): Reducer<T[]> {
  return (current, incoming) => {
    const merged = [...current];
    const positions = new Map(current.map((item, index) => [key(item), index]));
    for (const item of incoming) {
      const k = key(item);
      const at = positions.get(k);
      if (at === undefined) {
        positions.set(k, merged.length);
        merged.push(item);
      } else {
        merged[at] = item;
      }
    }
    return merged;
  };
}

export function sum(): Reducer<number> {
  return (current, incoming) => current + incoming;
}

export function mergeRecords<V>(): Reducer<Record<string, V>> {
  return (current, incoming) => ({ ...current, ...incoming });
}
