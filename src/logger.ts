import { createWriteStream, type WriteStream } from "fs";
import { DateTime } from "luxon";

export type LogLevel = "debug" | "info" | "warning" | "error" | "critical";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

const CONSOLE_PREFIX: Record<LogLevel, string> = {
  debug: "🔍",
  info: "✅",
  warning: "⚠️",
  error: "❌",
  critical: "🛑",
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  critical(message: string): void;
  child(name: string): Logger;
}

/** Where formatted lines end up. */
export interface LogSink {
  write(line: string, level: LogLevel): void;
}

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  sinks: LogSink[];
  now?: () => DateTime;
}

export function formatLogLine(
  time: DateTime,
  name: string,
  level: LogLevel,
  message: string
): string {
  const asctime = time.toFormat("yyyy-MM-dd HH:mm:ss,SSS");
  return `${asctime} - ${name} - ${level.toUpperCase()} - ${message}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "debug"];
  const now = options.now ?? (() => DateTime.local());

  const log = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(now(), options.name, level, message);
    for (const sink of options.sinks) {
      sink.write(line, level);
    }
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warning: (message) => log("warning", message),
    error: (message) => log("error", message),
    critical: (message) => log("critical", message),
    child: (name) => createLogger({ ...options, name }),
  };
}

/**
 * Log file sink. The file is truncated when the sink is opened, so every run
 * starts with an empty log.
 */
export function fileSink(path: string): LogSink & { close(): Promise<void> } {
  const stream: WriteStream = createWriteStream(path, {
    flags: "w",
    encoding: "utf-8",
  });
  stream.on("error", (error) => {
    console.error(`❌ Log file ${path} is not writable:`, error.message);
  });

  return {
    write: (line) => {
      stream.write(`${line}\n`);
    },
    close: () =>
      new Promise<void>((resolve) => {
        stream.end(() => resolve());
      }),
  };
}

export function consoleSink(): LogSink {
  return {
    write: (line, level) => {
      const text = `${CONSOLE_PREFIX[level]} ${line}`;
      if (LEVEL_ORDER[level] >= LEVEL_ORDER.error) {
        console.error(text);
      } else if (level === "warning") {
        console.warn(text);
      } else {
        console.log(text);
      }
    },
  };
}

