import { tokenize } from "../html/tokenizer.js";
import type { HtmlToken } from "../html/tokens.js";
import { StructuralAssertionError } from "../utils/errors.js";

export type SampleNode = {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  children: SampleNode[];
  data: string;
};

export type Example = {
  input: string;
  output: string;
};

export type MismatchedEndTag = {
  expected: string;
  actual: string;
};

export type SampleExtraction = {
  examples: Example[];
  mismatchedEndTags: MismatchedEndTag[];
};

function isSampleContainer(tag: string, attributes: Readonly<Record<string, string>>): boolean {
  return tag === "div" && (attributes.class ?? "").includes("sample");
}

function collectPreformatted(node: SampleNode, output: string[]): void {
  if (node.tag === "pre") {
    output.push(node.data);
    return;
  }
  for (const child of node.children) {
    collectPreformatted(child, output);
  }
}

/**
 * Rebuilds only the sample region of a problem page from a token stream.
 *
 * Recording starts at a `div` whose class mentions "sample" and stops when the
 * element opened there is closed again. End tags are matched by position, not by
 * name; mismatches are recorded but still pop.
 */
export class SampleTreeBuilder {
  private recording = false;
  private readonly stack: SampleNode[] = [];
  private readonly completedRoots: SampleNode[] = [];
  private readonly mismatches: MismatchedEndTag[] = [];

  feed(token: HtmlToken): void {
    switch (token.type) {
      case "StartTag":
        this.handleStartTag(token.name, token.attributes);
        if (token.selfClosing && token.name !== "br") {
          this.handleEndTag(token.name);
        }
        return;
      case "EndTag":
        this.handleEndTag(token.name);
        return;
      case "Text":
      case "EntityRef":
      case "CharRef":
        this.handleData(token.data);
        return;
    }
  }

  get roots(): readonly SampleNode[] {
    return this.completedRoots;
  }

  get mismatchedEndTags(): readonly MismatchedEndTag[] {
    return this.mismatches;
  }

  getExamples(): Example[] {
    if (this.completedRoots.length === 0) {
      return [];
    }
    if (this.completedRoots.length > 1) {
      throw new StructuralAssertionError(
        `Found ${this.completedRoots.length} sample roots; expected exactly one.`
      );
    }

    const blocks: string[] = [];
    collectPreformatted(this.completedRoots[0], blocks);
    if (blocks.length % 2 !== 0) {
      throw new StructuralAssertionError(
        `Found an odd number of preformatted blocks (${blocks.length}) in the sample region.`
      );
    }

    const examples: Example[] = [];
    for (let index = 0; index < blocks.length; index += 2) {
      examples.push({ input: blocks[index], output: blocks[index + 1] });
    }
    return examples;
  }

  private top(): SampleNode | undefined {
    return this.stack[this.stack.length - 1];
  }

  private handleStartTag(tag: string, attributes: Readonly<Record<string, string>>): void {
    if (!this.recording && !isSampleContainer(tag, attributes)) {
      return;
    }
    this.recording = true;

    const parent = this.top();
    if (parent && tag === "br") {
      parent.data += "\n";
      return;
    }

    const node: SampleNode = { tag, attributes, children: [], data: "" };
    parent?.children.push(node);
    this.stack.push(node);
  }

  private handleEndTag(tag: string): void {
    if (!this.recording) {
      return;
    }
    const node = this.stack.pop();
    if (!node) {
      throw new Error("Sample recording is active without an open node.");
    }
    if (node.tag !== tag) {
      this.mismatches.push({ expected: node.tag, actual: tag });
    }
    if (this.stack.length === 0) {
      this.completedRoots.push(node);
      this.recording = false;
    }
  }

  private handleData(data: string): void {
    if (!this.recording) {
      return;
    }
    const node = this.top();
    if (!node) {
      throw new Error("Sample recording is active without an open node.");
    }
    node.data += data;
  }
}

export function extractSamples(html: string): SampleExtraction {
  const builder = new SampleTreeBuilder();
  for (const token of tokenize(html)) {
    builder.feed(token);
  }
  return {
    examples: builder.getExamples(),
    mismatchedEndTags: [...builder.mismatchedEndTags],
  };
}
