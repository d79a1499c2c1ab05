import { PracticumApiClient } from "./api/practicum-api";
import { checkTokens, type BotConfig } from "./config";
import type { Logger } from "./logger";
import { HomeworkStatusMonitor, type HomeworkApi } from "./monitor/homework-monitor";
import { TelegramNotifier, createTelegramBot } from "./notifier/telegram-notifier";
import { IntervalScheduler, type Sleep } from "./schedulers/interval-scheduler";
import type { MessageSender } from "./types";

export interface BotDependencies {
  logger: Logger;
  sender?: MessageSender;
  api?: HomeworkApi;
  sleep?: Sleep;
  initialWatermark?: number;
}

export interface HomeworkBot {
  monitor: HomeworkStatusMonitor;
  scheduler: IntervalScheduler;
}

/**
 * Wires the components around one config. Throws `TokenError` before anything
 * is created when a credential is missing.
 */
export function createHomeworkBot(
  config: BotConfig,
  deps: BotDependencies
): HomeworkBot {
  const { logger } = deps;
  checkTokens(config.credentials, logger);

  const sender =
    deps.sender ?? createTelegramBot(config.credentials.telegramToken);
  const notifier = new TelegramNotifier(
    sender,
    config.credentials.telegramChatId,
    logger.child("notifier")
  );
  const api =
    deps.api ??
    new PracticumApiClient({
      endpoint: config.endpoint,
      token: config.credentials.practicumToken,
      timeoutMs: config.requestTimeoutMs,
      logger: logger.child("practicum-api"),
    });

  const monitor = new HomeworkStatusMonitor({
    api,
    notifier,
    logger: logger.child("monitor"),
    verdicts: config.verdicts,
    initialWatermark: deps.initialWatermark,
  });

  const scheduler = new IntervalScheduler({
    intervalMs: config.retryPeriodMs,
    logger: logger.child("scheduler"),
    sleep: deps.sleep,
    tick: async (signal) => {
      await monitor.tick(signal);
    },
  });

  return { monitor, scheduler };
}
