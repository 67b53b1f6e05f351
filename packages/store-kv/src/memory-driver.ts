import type { KeyValueDriver, KeyValueOp } from './driver';

/**
 * Map-backed driver. Batches are applied synchronously, so no other caller
 * can observe a half-applied batch.
 */
export function createMemoryKeyValueDriver(
  initial?: Iterable<[string, string]>
): KeyValueDriver {
  const entries = new Map<string, string>(initial);

  const applyOp = (op: KeyValueOp) => {
    if (op.type === 'set') {
      entries.set(op.key, op.value);
    } else {
      entries.delete(op.key);
    }
  };

  return {
    async get(key) {
      return entries.get(key) ?? null;
    },
    async set(key, value) {
      entries.set(key, value);
    },
    async delete(key) {
      entries.delete(key);
    },
    async batch(ops) {
      for (const op of ops) {
        applyOp(op);
      }
    },
    async *entries(prefix) {
      const snapshot = Array.from(entries)
        .filter(([key]) => key.startsWith(prefix))
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      yield* snapshot;
    },
    async clear(prefix) {
      for (const key of Array.from(entries.keys())) {
        if (key.startsWith(prefix)) entries.delete(key);
      }
    },
    async close() {
      entries.clear();
    },
  };
}
