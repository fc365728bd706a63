import type { OpenError } from "./errors";

/**
 * Filesystem identity of a regular file. All hard links to the same
 * content share one identity. Kept as bigint: 64-bit inode numbers do not
 * fit a double.
 */
export interface InodeId {
  dev: bigint;
  ino: bigint;
}

/**
 * One distinct inode seen among regular files during a walk.
 */
export interface LedgerEntry {
  inode: InodeId;
  /** Size in bytes, as reported by lstat */
  size: number;
  /**
   * Starts at the on-disk hard-link count and loses one for every further
   * link found inside the walked tree.
   */
  remainingLinks: number;
}

/**
 * Counts local to a single directory level (direct entries only).
 */
export interface DirectoryStats {
  /** Regular-file links found directly in this directory */
  fileLinks: number;
  /** Bytes used by those file links */
  fileSpace: number;
  /** Immediate subdirectories, excluding "." and ".." */
  subdirectories: number;
  /** Sum of the subdirectory entries' own sizes, not their contents */
  subdirectorySpace: number;
}

/**
 * Counters shared by every level of one run.
 */
export interface RunCounters {
  directories: number;
  /** Not deduplicated: every link to a multiply-linked file counts */
  fileLinks: number;
}

/**
 * Grand totals printed after a successful walk.
 */
export interface RunTotals {
  directories: number;
  fileLinks: number;
  /** Distinct inodes */
  files: number;
  fileSpace: number;
  /** Files with hard links outside the walked tree */
  outsideFiles: number;
  outsideSpace: number;
}

export type WalkResult =
  | { ok: true; stats: DirectoryStats }
  | { ok: false; error: OpenError };

/**
 * Parsed command line.
 */
export interface CliOptions {
  path: string;
  recursive: boolean;
}
