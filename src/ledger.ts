import type { InodeId, LedgerEntry } from "./types";

/**
 * Tracks every distinct inode met among regular files during a walk.
 *
 * The walker must call {@link InodeLedger.lookupAndDecrement} first and only
 * {@link InodeLedger.insert} when it returned false. After the walk, an entry
 * whose `remainingLinks` is still above 1 has hard links outside the tree.
 *
 * @example
 * const ledger = new InodeLedger();
 * if (!ledger.lookupAndDecrement(id)) {
 *   ledger.insert(stats.size, stats.nlink, id);
 * }
 */
export class InodeLedger {
  private entries = new Map<string, LedgerEntry>();

  /**
   * Returns true and drops one remaining link if the inode is known.
   * Unknown inodes leave the ledger untouched.
   */
  lookupAndDecrement(inode: InodeId): boolean {
    const entry = this.entries.get(inodeKey(inode));
    if (!entry) {
      return false;
    }
    entry.remainingLinks--;
    return true;
  }

  /**
   * Registers a new inode.
   *
   * @throws Error if the inode is already registered
   */
  insert(size: number, linkCount: number, inode: InodeId): void {
    const key = inodeKey(inode);
    if (this.entries.has(key)) {
      throw new Error(`Inode ${key} is already in the ledger`);
    }
    this.entries.set(key, {
      inode: { dev: inode.dev, ino: inode.ino },
      size,
      remainingLinks: linkCount
    });
  }

  /** Visits entries in insertion order. */
  forEach(visitor: (entry: Readonly<LedgerEntry>) => void): void {
    for (const entry of this.entries.values()) {
      visitor(entry);
    }
  }

  get(inode: InodeId): Readonly<LedgerEntry> | undefined {
    return this.entries.get(inodeKey(inode));
  }

  get size(): number {
    return this.entries.size;
  }
}

export function inodeKey(inode: InodeId): string {
  return `${inode.dev}:${inode.ino}`;
}
