import { DateTime } from "luxon";
import { createLogger, type LogLevel, type Logger } from "../logger";

export interface RecordedLine {
  level: LogLevel;
  line: string;
}

export function memoryLogger(name = "test"): {
  logger: Logger;
  lines: RecordedLine[];
} {
  const lines: RecordedLine[] = [];
  const logger = createLogger({
    name,
    sinks: [{ write: (line, level) => lines.push({ level, line }) }],
    now: () => DateTime.fromISO("2024-03-01T12:00:00.000"),
  });
  return { logger, lines };
}

export class FakeSender {
  readonly sent: { chatId: string; text: string }[] = [];
  failWith: Error | null = null;

  async sendMessage(chatId: string, text: string): Promise<unknown> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ chatId, text });
    return { message_id: this.sent.length };
  }
}
