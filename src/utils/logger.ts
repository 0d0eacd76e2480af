export type LogContext = Record<string, unknown> & {
  uri?: string;
  problemId?: string;
  contestUri?: string;
};

export type LogLevel = "info" | "warn" | "error";

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
};

export type LogSink = {
  write(entry: LogEntry): Promise<void>;
};

let logSink: LogSink | null = null;

export function setLogSink(sink: LogSink | null) {
  logSink = sink;
}

function write(level: LogLevel, message: string, context?: LogContext) {
  const timestamp = new Date().toISOString();
  const entry = {
    timestamp,
    level,
    message,
    ...(context ?? {}),
  };

  if (logSink) {
    void logSink.write({ timestamp, level, message, context }).catch((error) => {
      const fallback = JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "error",
        message: "Log sink failed.",
        error: error instanceof Error ? error.message : String(error),
      });
      console.error(fallback);
    });
  }

  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, context?: LogContext) {
  write("info", message, context);
}

export function logWarn(message: string, context?: LogContext) {
  write("warn", message, context);
}

export function logError(message: string, context?: LogContext) {
  write("error", message, context);
}
