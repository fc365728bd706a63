import { DEFAULT_PATH, RECURSIVE_FLAG, USAGE } from "./config";
import { UsageError, describeError } from "./errors";
import { createProgressReporter, type ProgressReporter } from "./progress";
import { buildStatsReport } from "./report";
import type { CliOptions } from "./types";

/**
 * Accepts `[]`, `[-r]`, `[<path>]` and `[-r, <path>]`.
 *
 * @throws UsageError for anything else
 */
export function parseArgs(argv: string[]): CliOptions {
  switch (argv.length) {
    case 0:
      return { path: DEFAULT_PATH, recursive: false };
    case 1:
      return argv[0] === RECURSIVE_FLAG
        ? { path: DEFAULT_PATH, recursive: true }
        : { path: argv[0], recursive: false };
    case 2:
      if (argv[0] !== RECURSIVE_FLAG) {
        throw new UsageError("Incorrect parameters.");
      }
      return { path: argv[1], recursive: true };
    default:
      throw new UsageError("Incorrect number of parameters.");
  }
}

function printUsage(): void {
  console.error(USAGE);
}

/**
 * Runs one statistics pass and returns the process exit code.
 *
 * Exit code 1 means bad arguments, an unopenable starting directory or a
 * fatal error during the walk. Failures below the starting directory only
 * produce diagnostics and still exit 0.
 */
export async function run(
  argv: string[],
  reporter: ProgressReporter = createProgressReporter()
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) {
      throw err;
    }
    console.error(err.message);
    printUsage();
    return 1;
  }

  try {
    const result = await buildStatsReport(options.path, options.recursive, reporter);
    return result.ok ? 0 : 1;
  } catch (err) {
    console.error(`Failed to compute directory statistics: ${describeError(err)}`);
    return 1;
  }
}
