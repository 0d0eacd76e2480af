import { tokenize } from "../html/tokenizer.js";
import type { HtmlToken } from "../html/tokens.js";

const PROBLEM_LINK_PATTERN = /contest\/\d+\/problem\/(\w+)/;

/** Distinct problem ids linked from `<a href>` targets, sorted ascending. */
export function collectProblemIds(tokens: Iterable<HtmlToken>): string[] {
  const problems = new Set<string>();
  for (const token of tokens) {
    if (token.type !== "StartTag" || token.name !== "a") {
      continue;
    }
    const href = token.attributes.href;
    if (!href) {
      continue;
    }
    const match = PROBLEM_LINK_PATTERN.exec(href);
    if (match?.[1]) {
      problems.add(match[1]);
    }
  }
  return [...problems].sort();
}

export function parseContestPage(html: string): string[] {
  return collectProblemIds(tokenize(html));
}
