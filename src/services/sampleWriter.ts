import { promises as fs } from "node:fs";
import path from "node:path";

import type { Example } from "../parsers/problemSamples.js";

export type ExampleFiles = {
  inputPath: string;
  outputPath: string;
};

export function buildExampleFiles(directory: string, problemId: string, index: number): ExampleFiles {
  const baseName = problemId.toLowerCase();
  return {
    inputPath: path.join(directory, `${baseName}.in.${index}`),
    outputPath: path.join(directory, `${baseName}.out.${index}`),
  };
}

/**
 * Writes `<id>.in.<n>` / `<id>.out.<n>` (n from 1) into `<outputDir>/<id>`, both
 * lower-cased, replacing existing files. Returns the problem directory.
 */
export async function writeExamples(
  outputDir: string,
  problemId: string,
  examples: readonly Example[]
): Promise<string> {
  const directory = path.join(outputDir, problemId.toLowerCase());
  await fs.mkdir(directory, { recursive: true });

  for (const [offset, example] of examples.entries()) {
    const files = buildExampleFiles(directory, problemId, offset + 1);
    await fs.writeFile(files.inputPath, example.input, "utf8");
    await fs.writeFile(files.outputPath, example.output, "utf8");
  }
  return directory;
}
