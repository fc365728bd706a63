import { InodeLedger } from "./ledger";
import type { ProgressReporter } from "./progress";
import { walkDirectory } from "./scan";
import type { OpenError } from "./errors";
import type { DirectoryStats, RunCounters, RunTotals } from "./types";

export type StatsRunResult =
  | { ok: true; totals: RunTotals; ledger: InodeLedger }
  | { ok: false; error: OpenError };

/**
 * Derives the grand totals from the shared counters and the finished ledger.
 *
 * Every ledger entry is one distinct file. An entry that still has more than
 * one remaining link after the walk has links outside the walked tree, and
 * its full size counts toward the outside space.
 */
export function computeTotals(counters: RunCounters, ledger: InodeLedger): RunTotals {
  const totals: RunTotals = {
    directories: counters.directories,
    fileLinks: counters.fileLinks,
    files: 0,
    fileSpace: 0,
    outsideFiles: 0,
    outsideSpace: 0
  };

  ledger.forEach((entry) => {
    totals.files++;
    totals.fileSpace += entry.size;
    if (entry.remainingLinks > 1) {
      totals.outsideFiles++;
      totals.outsideSpace += entry.size;
    }
  });

  return totals;
}

/**
 * Walks `rootPath` and computes the grand totals.
 *
 * Process:
 * 1. Walk the tree, streaming per-directory stats to `reporter`
 * 2. If the starting directory could not be opened, stop with its error
 * 3. Scan the ledger once for distinct and outside-linked files
 * 4. Hand the totals to `reporter`
 *
 * @example
 * const result = await buildStatsReport('/srv/data', true, createProgressReporter());
 * if (!result.ok) process.exitCode = 1;
 */
export async function buildStatsReport(
  rootPath: string,
  recursive: boolean,
  reporter: ProgressReporter
): Promise<StatsRunResult> {
  const ledger = new InodeLedger();
  const counters: RunCounters = { directories: 0, fileLinks: 0 };

  const walked = await walkDirectory(rootPath, recursive, counters, ledger, reporter);
  if (!walked.ok) {
    return walked;
  }

  const totals = computeTotals(counters, ledger);
  reporter.totalsComputed(totals);

  return { ok: true, totals, ledger };
}

export function formatDirectoryReport(dirPath: string, stats: DirectoryStats): string {
  let report = `Directory: ${dirPath}\n`;
  report += `  Total file links: ${stats.fileLinks}\n`;
  report += `  Total file space: ${stats.fileSpace}\n`;
  report += `  Total sub-directories: ${stats.subdirectories}\n`;
  report += `  Total sub-directory file space: ${stats.subdirectorySpace}\n`;
  return report;
}

export function formatTotalsReport(totals: RunTotals): string {
  let report = `Total directories encountered: ${totals.directories}\n`;
  report += `Total file links: ${totals.fileLinks}\n`;
  report += `Total files: ${totals.files}\n`;
  report += `Total file space: ${totals.fileSpace}\n`;
  report += `Files linked outside directory structure: ${totals.outsideFiles}\n`;
  report += `File Space linked outside directory structure: ${totals.outsideSpace}\n`;
  return report;
}
