/**
 * In-memory idempotency keys for outbound sends.
 *
 * Usage:
 *   const store = createIdempotencyStore({ ttlMs: 24 * 60 * 60_000 });
 *   if (!store.claim(key)) return; // sent, or being sent
 *   try { await send(); store.complete(key); } catch (e) { store.release(key); throw e; }
 *
 * NOTE: This is process-local. Replicas behind a load balancer need a shared
 * store (Redis SET NX) with the same claim/complete/release semantics.
 */

interface IdempotencyConfig {
  /** How long a completed key suppresses repeats */
  ttlMs: number;
  now?: () => number;
}

interface Entry {
  state: "pending" | "done";
  expiresAt: number;
}

export interface IdempotencyStore {
  /** True when the caller now owns the key; false if it is pending or done. */
  claim(key: string): boolean;
  complete(key: string): void;
  /** Give a pending key back so a later retry can send. */
  release(key: string): void;
  isDone(key: string): boolean;
  destroy(): void;
}

export function createIdempotencyStore(config: IdempotencyConfig): IdempotencyStore {
  const store = new Map<string, Entry>();
  const now = config.now ?? Date.now;

  const cleanup = setInterval(() => {
    const t = now();
    for (const [key, entry] of store) {
      if (entry.expiresAt <= t) store.delete(key);
    }
  }, Math.max(1000, config.ttlMs));

  // Don't keep the process alive just for cleanup
  if (cleanup.unref) cleanup.unref();

  const live = (key: string): Entry | undefined => {
    const entry = store.get(key);
    if (entry && entry.expiresAt <= now()) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  return {
    claim(key) {
      if (live(key)) return false;
      store.set(key, { state: "pending", expiresAt: now() + config.ttlMs });
      return true;
    },

    complete(key) {
      store.set(key, { state: "done", expiresAt: now() + config.ttlMs });
    },

    release(key) {
      if (store.get(key)?.state === "pending") store.delete(key);
    },

    isDone(key) {
      return live(key)?.state === "done";
    },

    destroy() {
      clearInterval(cleanup);
      store.clear();
    },
  };
}
