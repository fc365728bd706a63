import type { DirStatError } from "./errors";
import { formatDirectoryReport, formatTotalsReport } from "./report";
import type { DirectoryStats, RunTotals } from "./types";

/**
 * Receives results as the walk produces them.
 */
export interface ProgressReporter {
  /** Called once per directory, after all of its entries are processed */
  directoryVisited(dirPath: string, stats: DirectoryStats): void;

  /** Called for every directory that cannot be opened or entry that cannot be stat'ed */
  entryFailed(error: DirStatError): void;

  /** Called once, after a successful walk */
  totalsComputed(totals: RunTotals): void;
}

/**
 * Writes report blocks to stdout and diagnostics to stderr.
 */
class ConsoleProgressReporter implements ProgressReporter {
  directoryVisited(dirPath: string, stats: DirectoryStats): void {
    process.stdout.write(formatDirectoryReport(dirPath, stats));
  }

  entryFailed(error: DirStatError): void {
    console.error(formatDiagnostic(error));
  }

  totalsComputed(totals: RunTotals): void {
    process.stdout.write(formatTotalsReport(totals));
  }
}

export function formatDiagnostic(error: DirStatError): string {
  switch (error.code) {
    case "OPEN":
      return `Error opening directory: ${error.path}: ${error.message}`;
    case "STAT":
      return `Error stating file: ${error.path}: ${error.message}`;
    default:
      return error.message;
  }
}

export function createProgressReporter(): ProgressReporter {
  return new ConsoleProgressReporter();
}
