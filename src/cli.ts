import { Command } from "commander";

import { APP_VERSION, loadConfig, validateConfig } from "./config/env.js";
import type { AppConfig } from "./config/env.js";
import { ContestScraper } from "./services/contestScraper.js";
import { FileLogSink } from "./services/logFile.js";
import { PageFetcher } from "./services/pageFetcher.js";
import type { PageSource } from "./services/pageFetcher.js";
import { createRequestPool } from "./services/requestPool.js";
import { buildContestUrl, parseContestId } from "./utils/contestUrl.js";
import { getErrorMessageForLog } from "./utils/errors.js";
import { logError, logInfo, setLogSink } from "./utils/logger.js";

/**
 * Scrapes one contest and returns the process exit code: 0 when every problem
 * was written, 1 when the contest page or any problem failed.
 */
export async function runScrape(
  contestArg: string,
  config: AppConfig,
  pages?: PageSource
): Promise<number> {
  const pool = pages
    ? undefined
    : createRequestPool({ proxies: config.proxies, requestDelayMs: config.requestDelayMs });
  const source =
    pages ??
    new PageFetcher({ timeoutMs: config.timeoutMs, userAgent: config.userAgent, scheduler: pool });
  const scraper = new ContestScraper(source, {
    outputDir: config.outputDir,
    concurrency: config.concurrency,
  });

  try {
    const contestUri = buildContestUrl(parseContestId(contestArg), config.codeforcesBaseUrl);
    const summary = await scraper.scrapeContest(contestUri);
    logInfo("Scrape finished.", {
      contestUri,
      problems: summary.problems.length,
      succeeded: summary.problems.length - summary.failedCount,
      failed: summary.failedCount,
      failedProblems: summary.results
        .filter((result) => result.status === "failed")
        .map((result) => result.problemId),
    });
    return summary.failedCount > 0 ? 1 : 0;
  } catch (error) {
    logError("Scrape aborted.", {
      contest: contestArg,
      errorName: error instanceof Error ? error.name : "Error",
      error: getErrorMessageForLog(error),
    });
    return 1;
  } finally {
    await pool?.close();
  }
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("cf-samples")
    .description("Download the sample tests of every problem in a Codeforces contest.")
    .version(APP_VERSION)
    .argument("<contest>", "URI or numerical ID of contest to scrape")
    .action(async (contest: string) => {
      const config = loadConfig();
      const configErrors = validateConfig(config);
      if (configErrors.length > 0) {
        for (const error of configErrors) {
          logError(error);
        }
        process.exitCode = 1;
        return;
      }

      const sink = config.logFile ? new FileLogSink(config.logFile) : null;
      setLogSink(sink);
      try {
        process.exitCode = await runScrape(contest, config);
      } finally {
        setLogSink(null);
        await sink?.flush();
      }
    });
  return program;
}
