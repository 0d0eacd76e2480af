export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return String((error as { message: unknown }).message);
  }
  return "";
}

export function getErrorMessageForLog(error: unknown): string {
  return getErrorMessage(error) || String(error);
}

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport failure, timeout or non-success response while retrieving a page. */
export class FetchError extends ScraperError {
  constructor(
    public readonly uri: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Unknown character entity or malformed numeric character reference. */
export class ParseError extends ScraperError {
  constructor(
    message: string,
    public readonly offset: number,
    public readonly entityName?: string
  ) {
    super(message);
  }
}

/** The page does not have the shape the sample extractor relies on. */
export class StructuralAssertionError extends ScraperError {}
