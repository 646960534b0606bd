// Per-path advisory locks. Entries exist only while someone holds or waits.

export type ReleaseLock = () => void;

export type PathLockTable = {
  readonly acquire: (key: string) => Promise<ReleaseLock>;
  /** Locks every key, in sorted order, so two callers can never deadlock. */
  readonly acquireAll: (keys: ReadonlyArray<string>) => Promise<ReleaseLock>;
  readonly isLocked: (key: string) => boolean;
  readonly size: () => number;
};

type LockEntry = {
  tail: Promise<void>;
  refs: number;
};

export function createPathLockTable(): PathLockTable {
  const entries = new Map<string, LockEntry>();

  async function acquire(key: string): Promise<ReleaseLock> {
    const entry = entries.get(key) ?? { tail: Promise.resolve(), refs: 0 };
    entries.set(key, entry);
    entry.refs += 1;

    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = entry.tail;
    entry.tail = previous.then(() => held);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      entry.refs -= 1;
      if (entry.refs === 0 && entries.get(key) === entry) {
        entries.delete(key);
      }
    };
  }

  async function acquireAll(keys: ReadonlyArray<string>): Promise<ReleaseLock> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: ReleaseLock[] = [];
    for (const key of ordered) {
      releases.push(await acquire(key));
    }
    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  return {
    acquire,
    acquireAll,
    isLocked: (key) => entries.has(key),
    size: () => entries.size,
  };
}
