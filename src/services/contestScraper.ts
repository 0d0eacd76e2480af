import pLimit from "p-limit";

import { parseContestPage } from "../parsers/contestPage.js";
import { patchProblemMarkup } from "../parsers/markupPatches.js";
import { extractSamples } from "../parsers/problemSamples.js";
import { buildProblemUrl } from "../utils/contestUrl.js";
import { ParseError, getErrorMessageForLog } from "../utils/errors.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";

import type { PageSource } from "./pageFetcher.js";
import { writeExamples } from "./sampleWriter.js";

export type ProblemResult =
  | { status: "success"; problemId: string; exampleCount: number; directory: string }
  | { status: "failed"; problemId: string; errorName: string; error: string };

export type ScrapeSummary = {
  contestUri: string;
  problems: string[];
  results: ProblemResult[];
  failedCount: number;
};

type ContestScraperOptions = {
  outputDir: string;
  concurrency: number;
};

export class ContestScraper {
  constructor(
    private readonly pages: PageSource,
    private readonly options: ContestScraperOptions
  ) {}

  /**
   * Retrieves the contest page and then every linked problem on a bounded pool.
   * Contest-page failures reject; problem failures are reported in the summary.
   */
  async scrapeContest(contestUri: string): Promise<ScrapeSummary> {
    const html = await this.retrieve(contestUri);
    let problems: string[];
    try {
      problems = parseContestPage(html);
    } catch (error) {
      if (error instanceof ParseError) {
        logError("Contest page could not be tokenized.", {
          contestUri,
          offset: error.offset,
          markup: html,
        });
      }
      throw error;
    }
    logInfo("Found problems.", { contestUri, count: problems.length, problems });

    const limit = pLimit(this.options.concurrency);
    const results = await Promise.all(
      problems.map((problemId) => limit(() => this.scrapeProblem(contestUri, problemId)))
    );
    const failedCount = results.filter((result) => result.status === "failed").length;
    return { contestUri, problems, results, failedCount };
  }

  async scrapeProblem(contestUri: string, problemId: string): Promise<ProblemResult> {
    const uri = buildProblemUrl(contestUri, problemId);
    let html: string | null = null;
    try {
      html = patchProblemMarkup(await this.retrieve(uri, problemId));
      const { examples, mismatchedEndTags } = extractSamples(html);
      if (mismatchedEndTags.length > 0) {
        logWarn("Sample region closed with mismatched end tags.", {
          problemId,
          mismatches: mismatchedEndTags.length,
          first: mismatchedEndTags[0],
        });
      }
      const directory = await writeExamples(this.options.outputDir, problemId, examples);
      logInfo("Wrote examples.", { problemId, examples: examples.length, directory });
      return { status: "success", problemId, exampleCount: examples.length, directory };
    } catch (error) {
      if (error instanceof ParseError && html !== null) {
        logError("Problem page could not be tokenized.", {
          problemId,
          uri,
          offset: error.offset,
          markup: html,
        });
      }
      const errorName = error instanceof Error ? error.name : "Error";
      const message = getErrorMessageForLog(error);
      logError("Problem failed.", { problemId, uri, errorName, error: message });
      return { status: "failed", problemId, errorName, error: message };
    }
  }

  private async retrieve(uri: string, problemId?: string): Promise<string> {
    logInfo("Retrieving page.", { uri, problemId });
    const html = await this.pages.fetchPage(uri);
    logInfo("Retrieved page.", { uri, problemId, bytes: Buffer.byteLength(html, "utf8") });
    return html;
  }
}
