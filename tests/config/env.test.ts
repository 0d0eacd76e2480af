import { loadConfig, validateConfig } from "../../src/config/env.js";
import type { AppConfig } from "../../src/config/env.js";

const VARIABLES = [
  "CODEFORCES_BASE_URL",
  "SCRAPER_CONCURRENCY",
  "SCRAPER_TIMEOUT_MS",
  "SCRAPER_REQUEST_DELAY_MS",
  "SCRAPER_PROXIES",
  "SCRAPER_OUTPUT_DIR",
  "SCRAPER_USER_AGENT",
  "LOG_FILE",
];

const validConfig: AppConfig = {
  codeforcesBaseUrl: "https://codeforces.com",
  concurrency: 5,
  timeoutMs: 15000,
  requestDelayMs: 250,
  proxies: [],
  outputDir: ".",
  userAgent: "cf-samples/1.0.0",
};

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(validConfig)).toEqual([]);
  });

  it("returns errors for invalid values", () => {
    const errors = validateConfig({
      codeforcesBaseUrl: "ftp://codeforces.com",
      concurrency: 1.5,
      timeoutMs: 0,
      requestDelayMs: -1,
      proxies: ["127.0.0.1:8080", "not-a-proxy"],
      outputDir: "",
      userAgent: "",
    });
    expect(errors).toEqual([
      "CODEFORCES_BASE_URL must be a valid http(s) URL.",
      "SCRAPER_CONCURRENCY must be a whole number of at least 1.",
      "SCRAPER_TIMEOUT_MS must be greater than 0.",
      "SCRAPER_REQUEST_DELAY_MS must be 0 or greater.",
      'SCRAPER_PROXIES entry "not-a-proxy" must be host:port or host:port:user:pass.',
      "SCRAPER_OUTPUT_DIR is missing.",
      "SCRAPER_USER_AGENT is missing.",
    ]);
  });

  it("rejects a concurrency below one", () => {
    expect(validateConfig({ ...validConfig, concurrency: 0 })).toEqual([
      "SCRAPER_CONCURRENCY must be a whole number of at least 1.",
    ]);
  });
});

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARIABLES) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARIABLES) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("falls back to defaults", () => {
    expect(loadConfig()).toEqual({
      ...validConfig,
      logFile: undefined,
    });
  });

  it("reads values from the environment", () => {
    process.env.CODEFORCES_BASE_URL = "https://mirror.codeforces.test///";
    process.env.SCRAPER_CONCURRENCY = "3";
    process.env.SCRAPER_TIMEOUT_MS = "2000";
    process.env.SCRAPER_REQUEST_DELAY_MS = "0";
    process.env.SCRAPER_PROXIES = " 10.0.0.2:3128 , proxy.test:80:user:pass ,,";
    process.env.SCRAPER_OUTPUT_DIR = " samples ";
    process.env.SCRAPER_USER_AGENT = "test-agent";
    process.env.LOG_FILE = "./scrape.log";

    expect(loadConfig()).toEqual({
      codeforcesBaseUrl: "https://mirror.codeforces.test",
      concurrency: 3,
      timeoutMs: 2000,
      requestDelayMs: 0,
      proxies: ["10.0.0.2:3128", "proxy.test:80:user:pass"],
      outputDir: "samples",
      userAgent: "test-agent",
      logFile: "./scrape.log",
    });
  });

  it("ignores numbers that do not parse", () => {
    process.env.SCRAPER_CONCURRENCY = "many";
    expect(loadConfig().concurrency).toBe(5);
  });
});
