const locks = new Map<string, Promise<void>>();

/**
 * Serialize async work per key. Callers on different keys never wait on each other.
 */
export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const next = new Promise<void>((r) => { release = r; });
  locks.set(key, next);

  await prev;
  try {
    return await fn();
  } finally {
    release();
    if (locks.get(key) === next) {
      locks.delete(key);
    }
  }
}
