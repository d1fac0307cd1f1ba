const locks = new Map<string, Promise<void>>();

/**
 * Runs `task` once every earlier task holding the same key has settled.
 * Only serializes callers inside this process.
 */
export async function withKeyedLock<T>(key: string, task: () => Promise<T>): Promise<T> {
  while (locks.has(key)) {
    await locks.get(key);
  }

  let unlock: () => void = () => {};
  const lockPromise = new Promise<void>((resolve) => {
    unlock = resolve;
  });
  locks.set(key, lockPromise);

  try {
    return await task();
  } finally {
    locks.delete(key);
    unlock();
  }
}

export function isLocked(key: string): boolean {
  return locks.has(key);
}
