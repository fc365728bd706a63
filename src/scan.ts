import fs from "fs";
import { PATH_SEPARATOR } from "./config";
import { AllocationError, OpenError, StatError } from "./errors";
import type { InodeLedger } from "./ledger";
import type { ProgressReporter } from "./progress";
import type { DirectoryStats, RunCounters, WalkResult } from "./types";

const fsp = fs.promises;

/**
 * Removes trailing separators. The filesystem root keeps its single "/".
 */
export function stripTrailingSeparators(dirPath: string): string {
  let end = dirPath.length;
  while (end > 0 && dirPath[end - 1] === PATH_SEPARATOR) {
    end--;
  }
  if (end === 0 && dirPath.length > 0) {
    return PATH_SEPARATOR;
  }
  return dirPath.slice(0, end);
}

/**
 * Joins a stripped directory path and an entry name with exactly one separator.
 *
 * @throws AllocationError if the path string cannot be built
 */
export function buildChildPath(dirPath: string, name: string): string {
  try {
    return dirPath === PATH_SEPARATOR ? `${PATH_SEPARATOR}${name}` : `${dirPath}${PATH_SEPARATOR}${name}`;
  } catch (err) {
    throw new AllocationError(dirPath, err);
  }
}

/**
 * Collects statistics for one directory and, when `recursive` is set, for
 * every directory below it.
 *
 * Entries are handled one at a time, depth first. Regular files are counted
 * and registered in `ledger`; directories are counted by their own entry size
 * and descended into if `recursive`; anything else (symbolic links, devices,
 * sockets, fifos) is ignored. Symbolic links are never followed.
 *
 * A directory that cannot be opened yields `{ ok: false }` after the failure
 * is passed to `reporter`. Below the top level that result is dropped and the
 * parent carries on with its remaining entries. An entry that cannot be
 * stat'ed is reported and skipped.
 *
 * On success the directory's own stats go to `reporter.directoryVisited`
 * (children before parents) and `counters` are updated.
 *
 * @throws AllocationError if a child path cannot be built
 *
 * @example
 * const ledger = new InodeLedger();
 * const counters = { directories: 0, fileLinks: 0 };
 * const result = await walkDirectory('/data', true, counters, ledger, reporter);
 */
export async function walkDirectory(
  dirPath: string,
  recursive: boolean,
  counters: RunCounters,
  ledger: InodeLedger,
  reporter: ProgressReporter
): Promise<WalkResult> {
  let dir: fs.Dir;
  try {
    dir = await fsp.opendir(dirPath);
  } catch (err) {
    const error = new OpenError(dirPath, err);
    reporter.entryFailed(error);
    return { ok: false, error };
  }

  const basePath = stripTrailingSeparators(dirPath);
  const stats: DirectoryStats = {
    fileLinks: 0,
    fileSpace: 0,
    subdirectories: 0,
    subdirectorySpace: 0
  };

  // Iterating closes the handle, including when the loop body throws.
  for await (const entry of dir) {
    const childPath = buildChildPath(basePath, entry.name);

    let entryStats: fs.BigIntStats;
    try {
      entryStats = await fsp.lstat(childPath, { bigint: true });
    } catch (err) {
      reporter.entryFailed(new StatError(childPath, err));
      continue;
    }

    if (entryStats.isFile()) {
      const size = Number(entryStats.size);
      stats.fileLinks++;
      stats.fileSpace += size;

      const inode = { dev: entryStats.dev, ino: entryStats.ino };
      if (!ledger.lookupAndDecrement(inode)) {
        ledger.insert(size, Number(entryStats.nlink), inode);
      }
    } else if (entryStats.isDirectory() && entry.name !== "." && entry.name !== "..") {
      stats.subdirectories++;
      stats.subdirectorySpace += Number(entryStats.size);

      if (recursive) {
        // Failures below the top level were already reported.
        await walkDirectory(childPath, recursive, counters, ledger, reporter);
      }
    }
  }

  counters.fileLinks += stats.fileLinks;
  counters.directories++;

  reporter.directoryVisited(basePath, stats);
  return { ok: true, stats };
}
