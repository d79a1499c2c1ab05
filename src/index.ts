import dotenv from "dotenv";
import { createHomeworkBot, type HomeworkBot } from "./bot";
import { loadConfig, type BotConfig } from "./config";
import { TokenError, describeError } from "./errors";
import { consoleSink, createLogger, fileSink } from "./logger";

dotenv.config();

(async () => {
  let config: BotConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error("❌ Startup error:", describeError(err));
    process.exit(1);
  }

  const logFile = fileSink(config.logFile);
  const logger = createLogger({
    name: "homework-bot",
    level: config.logLevel,
    sinks: [logFile, consoleSink()],
  });

  let bot: HomeworkBot;
  try {
    bot = createHomeworkBot(config, { logger });
  } catch (err) {
    if (!(err instanceof TokenError)) {
      logger.critical(`Startup error: ${describeError(err)}`);
    }
    await logFile.close();
    process.exit(1);
  }

  const { scheduler } = bot;
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      logger.warning(`${signal} received again, exiting without waiting`);
      process.exit(1);
    }
    stopping = true;
    logger.info(`${signal} received, stopping`);
    scheduler.stop();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  logger.info("Homework status bot started");
  await scheduler.start();

  const { tickCount, lastTickAt } = scheduler.getStatus();
  logger.info(
    `Stopped after ${tickCount} poll(s), last at ${lastTickAt?.toISOString() ?? "never"}`
  );
  await logFile.close();
  process.exit(0);
})().catch((err) => {
  console.error("❌ Fatal error:", err);
  process.exit(1);
});
