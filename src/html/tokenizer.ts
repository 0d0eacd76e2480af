import { ParseError } from "../utils/errors.js";

import { lookupEntity } from "./entities.js";
import type { CharRefToken, EntityRefToken, HtmlToken, StartTagToken } from "./tokens.js";

const RAW_TEXT_ELEMENTS = new Set(["script", "style"]);
const MAX_CODE_POINT = 0x10ffff;

type Scanned<T> = { token: T; end: number };

function isAsciiAlpha(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z]$/.test(char);
}

function isAsciiAlphanumeric(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z0-9]$/.test(char);
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /^[\t\n\f\r ]$/.test(char);
}

function skipWhitespace(markup: string, index: number): number {
  let cursor = index;
  while (cursor < markup.length && isWhitespace(markup[cursor])) {
    cursor += 1;
  }
  return cursor;
}

function skipPast(markup: string, index: number, terminator: string): number {
  const close = markup.indexOf(terminator, index);
  return close === -1 ? markup.length : close + terminator.length;
}

function scanTagName(markup: string, index: number): number {
  let cursor = index;
  while (cursor < markup.length) {
    const char = markup[cursor];
    if (isWhitespace(char) || char === "/" || char === ">") {
      break;
    }
    cursor += 1;
  }
  return cursor;
}

function decodeNumeric(payload: string, offset: number): { codePoint: number; isHex: boolean } {
  const isHex = payload.startsWith("x") || payload.startsWith("X");
  const digits = isHex ? payload.slice(1) : payload;
  const wellFormed = isHex ? /^[0-9A-Fa-f]+$/.test(digits) : /^[0-9]+$/.test(digits);
  if (!wellFormed) {
    throw new ParseError(`Malformed numeric character reference &#${payload}; at offset ${offset}.`, offset);
  }
  const codePoint = Number.parseInt(digits, isHex ? 16 : 10);
  if (codePoint > MAX_CODE_POINT) {
    throw new ParseError(
      `Numeric character reference &#${payload}; at offset ${offset} is outside the Unicode range.`,
      offset
    );
  }
  return { codePoint, isHex };
}

/**
 * Reads a character reference starting at the `&` at `start`. Returns null when the
 * ampersand does not start a reference and should be kept as text.
 */
function readReference(
  markup: string,
  start: number
): Scanned<EntityRefToken | CharRefToken> | null {
  const next = markup[start + 1];
  if (next === "#") {
    let end = start + 2;
    while (end < markup.length && isAsciiAlphanumeric(markup[end])) {
      end += 1;
    }
    const { codePoint, isHex } = decodeNumeric(markup.slice(start + 2, end), start);
    return {
      token: { type: "CharRef", codePoint, isHex, data: String.fromCodePoint(codePoint) },
      end: markup[end] === ";" ? end + 1 : end,
    };
  }

  if (!isAsciiAlpha(next)) {
    return null;
  }
  let end = start + 1;
  while (end < markup.length && isAsciiAlphanumeric(markup[end])) {
    end += 1;
  }
  const name = markup.slice(start + 1, end);
  const codePoint = lookupEntity(name);
  if (codePoint === undefined) {
    throw new ParseError(`Unrecognized HTML entity &${name}; at offset ${start}.`, start, name);
  }
  return {
    token: { type: "EntityRef", name, data: String.fromCodePoint(codePoint) },
    end: markup[end] === ";" ? end + 1 : end,
  };
}

/** Attribute values keep anything that is not a well-formed, known reference as-is. */
function decodeAttributeValue(value: string): string {
  if (!value.includes("&")) {
    return value;
  }
  return value.replace(
    /&(?:#([xX][0-9A-Fa-f]+|[0-9]+);?|([A-Za-z][A-Za-z0-9]*);)/g,
    (match: string, numeric: string | undefined, name: string | undefined) => {
      if (numeric !== undefined) {
        const isHex = numeric.startsWith("x") || numeric.startsWith("X");
        const codePoint = Number.parseInt(isHex ? numeric.slice(1) : numeric, isHex ? 16 : 10);
        return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
      }
      const codePoint = name === undefined ? undefined : lookupEntity(name);
      return codePoint === undefined ? match : String.fromCodePoint(codePoint);
    }
  );
}

function readStartTag(markup: string, start: number): Scanned<HtmlToken> {
  const nameEnd = scanTagName(markup, start + 1);
  const name = markup.slice(start + 1, nameEnd).toLowerCase();
  const attributes: Record<string, string> = {};
  let selfClosing = false;
  let index = nameEnd;

  while (index < markup.length) {
    const char = markup[index];
    if (isWhitespace(char)) {
      index += 1;
      continue;
    }
    if (char === ">") {
      const token: StartTagToken = {
        type: "StartTag",
        name,
        attributes: Object.freeze(attributes),
        selfClosing,
      };
      return { token, end: index + 1 };
    }
    if (char === "/") {
      selfClosing = markup[index + 1] === ">";
      index += 1;
      continue;
    }
    selfClosing = false;

    let attributeEnd = index + 1;
    while (attributeEnd < markup.length) {
      const current = markup[attributeEnd];
      if (isWhitespace(current) || current === "/" || current === ">" || current === "=") {
        break;
      }
      attributeEnd += 1;
    }
    const attributeName = markup.slice(index, attributeEnd).toLowerCase();
    index = skipWhitespace(markup, attributeEnd);

    let value = "";
    if (markup[index] === "=") {
      index = skipWhitespace(markup, index + 1);
      const quote = markup[index];
      if (quote === '"' || quote === "'") {
        const close = markup.indexOf(quote, index + 1);
        if (close === -1) {
          break;
        }
        value = markup.slice(index + 1, close);
        index = close + 1;
      } else {
        let valueEnd = index;
        while (
          valueEnd < markup.length &&
          !isWhitespace(markup[valueEnd]) &&
          markup[valueEnd] !== ">"
        ) {
          valueEnd += 1;
        }
        value = markup.slice(index, valueEnd);
        index = valueEnd;
      }
    }

    if (!Object.hasOwn(attributes, attributeName)) {
      attributes[attributeName] = decodeAttributeValue(value);
    }
  }

  // Unterminated tag at end of input.
  return { token: { type: "Text", data: markup.slice(start) }, end: markup.length };
}

/**
 * Reads whatever starts with the `<` at `start`. A null token means the construct is
 * skipped (comments, declarations); a null result means the `<` is plain text.
 */
function readMarkup(markup: string, start: number): Scanned<HtmlToken | null> | null {
  const next = markup[start + 1];
  if (markup.startsWith("<!--", start)) {
    return { token: null, end: skipPast(markup, start + 4, "-->") };
  }
  if (markup.startsWith("<![CDATA[", start)) {
    return { token: null, end: skipPast(markup, start + 9, "]]>") };
  }
  if (next === "!" || next === "?") {
    return { token: null, end: skipPast(markup, start + 2, ">") };
  }
  if (next === "/") {
    if (!isAsciiAlpha(markup[start + 2])) {
      return { token: null, end: skipPast(markup, start + 2, ">") };
    }
    const nameEnd = scanTagName(markup, start + 2);
    const close = markup.indexOf(">", nameEnd);
    if (close === -1) {
      return { token: { type: "Text", data: markup.slice(start) }, end: markup.length };
    }
    return {
      token: { type: "EndTag", name: markup.slice(start + 2, nameEnd).toLowerCase() },
      end: close + 1,
    };
  }
  if (isAsciiAlpha(next)) {
    return readStartTag(markup, start);
  }
  return null;
}

function findRawTextEnd(markup: string, from: number, name: string): number {
  const pattern = new RegExp(`</${name}[\\t\\n\\f\\r />]`, "gi");
  pattern.lastIndex = from;
  const match = pattern.exec(markup);
  return match ? match.index : markup.length;
}

/**
 * Lazily tokenizes `markup` in document order. Tags are reported one by one without
 * any balancing; character references in text are resolved and reported as their own
 * tokens. Throws ParseError on an unknown entity or a malformed numeric reference.
 */
export function* tokenize(markup: string): Generator<HtmlToken, void, undefined> {
  let index = 0;
  while (index < markup.length) {
    const char = markup[index];

    if (char === "<") {
      const scanned = readMarkup(markup, index);
      if (!scanned) {
        yield { type: "Text", data: "<" };
        index += 1;
        continue;
      }
      index = scanned.end;
      const token = scanned.token;
      if (!token) {
        continue;
      }
      yield token;
      if (token.type === "StartTag" && !token.selfClosing && RAW_TEXT_ELEMENTS.has(token.name)) {
        const rawEnd = findRawTextEnd(markup, index, token.name);
        if (rawEnd > index) {
          yield { type: "Text", data: markup.slice(index, rawEnd) };
        }
        index = rawEnd;
      }
      continue;
    }

    if (char === "&") {
      const reference = readReference(markup, index);
      if (reference) {
        yield reference.token;
        index = reference.end;
      } else {
        yield { type: "Text", data: "&" };
        index += 1;
      }
      continue;
    }

    let end = index + 1;
    while (end < markup.length && markup[end] !== "<" && markup[end] !== "&") {
      end += 1;
    }
    yield { type: "Text", data: markup.slice(index, end) };
    index = end;
  }
}
