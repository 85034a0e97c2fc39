import { loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { type JobDependencies, runWeeklyReportJob } from "./runWeeklyReportJob.js";

export const HELP_TEXT = `
📋 Weekly PR Report

Usage: npm run report:run [options]

Options:
  --output=PATH   Write the report to PATH instead of REPORT_OUTPUT_PATH
  --help, -h      Show this help message

Environment:
  GITHUB_TOKEN     GitHub token (required)
  GITHUB_AUTHORS   Comma-separated logins (default: the token's user)
  LLM_ENDPOINT     Completions endpoint URL (required)
  LLM_TOKEN        Bearer token for the endpoint (required)
  REPORT_TIMEZONE  Timezone that decides "last week" (default: UTC)

Examples:
  npm run report:run
  npm run report:run -- --output=reports/last-week.md
`;

/**
 * Runs the job for the given command-line arguments and resolves to the
 * process exit code: 0 once a report is written, 1 on any fatal error.
 */
export async function runCli(args: string[], deps: JobDependencies = {}): Promise<number> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(HELP_TEXT);
    return 0;
  }

  try {
    const config = deps.config ?? loadConfig();

    const outputArg = args.find((a) => a.startsWith("--output="));
    const outputPath = outputArg?.slice("--output=".length).trim();
    if (outputPath) {
      config.outputPath = outputPath;
    }

    const result = await runWeeklyReportJob({ ...deps, config });
    console.log(`\n✅ Weekly report written to ${result.outputPath}`);
    console.log(
      `   - ${result.pullRequests.length} pull requests (${result.range.startDate} to ${result.range.endDate})`
    );
    if (result.degraded > 0) {
      console.log(`   - ${result.degraded} with placeholder status or summary`);
    }
    return 0;
  } catch (err) {
    logger.fatal({ err: errorMessage(err) }, "Weekly report failed");
    return 1;
  }
}
