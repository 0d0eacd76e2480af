import { promises as fs } from "node:fs";
import path from "node:path";

import type { LogEntry, LogSink } from "../utils/logger.js";

/** Appends every log entry to a file as one JSON line. */
export class FileLogSink implements LogSink {
  private ready: Promise<void> | null = null;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  write(entry: LogEntry): Promise<void> {
    const line = `${JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.context ?? {}),
    })}\n`;
    const next = this.pending.then(async () => {
      await this.ensureDirectory();
      await fs.appendFile(this.filePath, line, "utf8");
    });
    this.pending = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every entry written so far has reached the file. */
  flush(): Promise<void> {
    return this.pending;
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs
        .mkdir(path.dirname(this.filePath), { recursive: true })
        .then(() => undefined);
    }
    return this.ready;
  }
}
