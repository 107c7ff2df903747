/**
 * Copy-on-write Map operations.
 *
 * The registry swaps its whole map on every write, so a snapshot taken by a
 * reader is never mutated underneath it.
 */

/**
 * Return a new Map with the entry added or replaced.
 */
export function mapSet<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): ReadonlyMap<K, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

/**
 * Return a new Map without the given key.
 */
export function mapDelete<K, V>(map: ReadonlyMap<K, V>, key: K): ReadonlyMap<K, V> {
  const next = new Map(map);
  next.delete(key);
  return next;
}

/**
 * Split a Map in one pass: entries matching `predicate` are removed and
 * returned, the rest form the new Map.
 */
export function mapPartition<K, V>(
  map: ReadonlyMap<K, V>,
  predicate: (key: K, value: V) => boolean,
): { readonly kept: ReadonlyMap<K, V>; readonly removed: readonly V[] } {
  const kept = new Map<K, V>();
  const removed: V[] = [];
  for (const [key, value] of map) {
    if (predicate(key, value)) {
      removed.push(value);
    } else {
      kept.set(key, value);
    }
  }
  return { kept, removed };
}
