import dotenv from "dotenv";

import { parseProxyEntry } from "../services/requestPool.js";

dotenv.config();

export const APP_VERSION = "1.0.0";

export type AppConfig = {
  codeforcesBaseUrl: string;
  concurrency: number;
  timeoutMs: number;
  requestDelayMs: number;
  proxies: string[];
  outputDir: string;
  userAgent: string;
  logFile?: string;
};

function parseNumber(value: string, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  if (!isValidUrl(config.codeforcesBaseUrl)) {
    errors.push("CODEFORCES_BASE_URL must be a valid http(s) URL.");
  }
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push("SCRAPER_CONCURRENCY must be a whole number of at least 1.");
  }
  if (config.timeoutMs <= 0) {
    errors.push("SCRAPER_TIMEOUT_MS must be greater than 0.");
  }
  if (config.requestDelayMs < 0) {
    errors.push("SCRAPER_REQUEST_DELAY_MS must be 0 or greater.");
  }
  for (const proxy of config.proxies) {
    if (!parseProxyEntry(proxy)) {
      errors.push(`SCRAPER_PROXIES entry "${proxy}" must be host:port or host:port:user:pass.`);
    }
  }
  if (!config.outputDir) {
    errors.push("SCRAPER_OUTPUT_DIR is missing.");
  }
  if (!config.userAgent) {
    errors.push("SCRAPER_USER_AGENT is missing.");
  }
  return errors;
}

export function loadConfig(): AppConfig {
  const codeforcesBaseUrl = (
    process.env.CODEFORCES_BASE_URL?.trim() || "https://codeforces.com"
  ).replace(/\/+$/, "");
  const concurrency = parseNumber(process.env.SCRAPER_CONCURRENCY ?? "5", 5);
  const timeoutMs = parseNumber(process.env.SCRAPER_TIMEOUT_MS ?? "15000", 15000);
  const requestDelayMs = parseNumber(process.env.SCRAPER_REQUEST_DELAY_MS ?? "250", 250);
  const proxies = parseList(process.env.SCRAPER_PROXIES);
  const outputDir = process.env.SCRAPER_OUTPUT_DIR?.trim() || ".";
  const userAgent = process.env.SCRAPER_USER_AGENT?.trim() || `cf-samples/${APP_VERSION}`;
  const logFile = process.env.LOG_FILE?.trim() || undefined;

  return {
    codeforcesBaseUrl,
    concurrency,
    timeoutMs,
    requestDelayMs,
    proxies,
    outputDir,
    userAgent,
    logFile,
  };
}
