import type { Dispatcher } from "undici";

import { FetchError, getErrorMessageForLog } from "../utils/errors.js";

import type { RequestScheduler } from "./requestPool.js";

export type PageSource = {
  fetchPage(uri: string): Promise<string>;
};

type PageFetcherOptions = {
  timeoutMs: number;
  userAgent: string;
  scheduler?: RequestScheduler;
};

const immediateScheduler: RequestScheduler = {
  schedule: (task) => task(undefined),
};

function isAbortError(error: unknown): boolean {
  const name =
    error instanceof Error
      ? error.name
      : typeof error === "object" && error !== null
        ? String((error as { name?: unknown }).name ?? "")
        : "";
  const lowered = (error instanceof Error ? error.message : "").toLowerCase();
  return (
    name === "AbortError" ||
    lowered.includes("operation was aborted") ||
    lowered.includes("request was aborted")
  );
}

/** Retrieves HTML pages as text. Failures are reported once, without retrying. */
export class PageFetcher implements PageSource {
  private scheduler: RequestScheduler;

  constructor(private options: PageFetcherOptions) {
    this.scheduler = options.scheduler ?? immediateScheduler;
  }

  async fetchPage(uri: string): Promise<string> {
    const attempt = async (dispatcher?: Dispatcher) => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
      try {
        const response = await fetch(uri, {
          signal: controller.signal,
          redirect: "follow",
          headers: {
            "user-agent": this.options.userAgent,
            accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
          },
          ...(dispatcher ? { dispatcher } : {}),
        });
        if (!response.ok) {
          throw new FetchError(uri, `HTTP ${response.status} while retrieving ${uri}`, response.status);
        }
        return await response.text();
      } finally {
        clearTimeout(timeout);
      }
    };

    try {
      return await this.scheduler.schedule(attempt);
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new FetchError(
          uri,
          `Request for ${uri} timed out after ${this.options.timeoutMs}ms`,
          undefined,
          { cause: error }
        );
      }
      throw new FetchError(uri, `Failed to retrieve ${uri}: ${getErrorMessageForLog(error)}`, undefined, {
        cause: error,
      });
    }
  }
}
