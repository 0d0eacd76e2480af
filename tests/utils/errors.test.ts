import {
  FetchError,
  ParseError,
  ScraperError,
  StructuralAssertionError,
  getErrorMessage,
  getErrorMessageForLog,
} from "../../src/utils/errors.js";

describe("getErrorMessage", () => {
  it("returns message from Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("returns message from string", () => {
    expect(getErrorMessage("nope")).toBe("nope");
  });

  it("returns message from object with message field", () => {
    expect(getErrorMessage({ message: "from-object" })).toBe("from-object");
  });

  it("returns empty string for unsupported input", () => {
    expect(getErrorMessage({})).toBe("");
  });
});

describe("getErrorMessageForLog", () => {
  it("falls back to string conversion", () => {
    expect(getErrorMessageForLog(42)).toBe("42");
  });
});

describe("scraper errors", () => {
  it("names errors after their class", () => {
    const fetchError = new FetchError("https://codeforces.com/contest/1", "HTTP 503", 503);
    expect(fetchError).toBeInstanceOf(ScraperError);
    expect(fetchError.name).toBe("FetchError");
    expect(fetchError.status).toBe(503);
    expect(fetchError.uri).toBe("https://codeforces.com/contest/1");

    expect(new StructuralAssertionError("odd").name).toBe("StructuralAssertionError");
  });

  it("keeps the offset and entity of parse errors", () => {
    const error = new ParseError("Unrecognized HTML entity &foo;", 12, "foo");
    expect(error).toBeInstanceOf(Error);
    expect(error.offset).toBe(12);
    expect(error.entityName).toBe("foo");
  });

  it("keeps the cause of fetch errors", () => {
    const cause = new TypeError("fetch failed");
    const error = new FetchError("https://x.test", "Failed", undefined, { cause });
    expect(error.cause).toBe(cause);
    expect(error.status).toBeUndefined();
  });
});
