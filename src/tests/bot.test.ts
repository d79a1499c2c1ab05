import axios, { type AxiosResponse } from "axios";
import { describe, expect, it } from "vitest";
import { PracticumApiClient } from "../api/practicum-api";
import { createHomeworkBot, type HomeworkBot } from "../bot";
import { loadConfig } from "../config";
import { TokenError } from "../errors";
import { FakeSender, memoryLogger } from "./helpers";

const env = {
  PRACTICUM_TOKEN: "practicum-test-token",
  TELEGRAM_TOKEN: "telegram-test-token",
  TELEGRAM_CHAT_ID: "777",
  RETRY_PERIOD: "600",
};

describe("createHomeworkBot", () => {
  it("fails before creating anything when a credential is missing", () => {
    const { logger, lines } = memoryLogger();
    const sender = new FakeSender();
    const config = loadConfig({ ...env, TELEGRAM_CHAT_ID: "" });

    expect(() => createHomeworkBot(config, { logger, sender })).toThrow(
      TokenError
    );
    expect(lines.map((l) => l.level)).toEqual(["critical"]);
    expect(sender.sent).toEqual([]);
  });

  it("polls, notifies on change and sleeps the retry period between ticks", async () => {
    const bodies = [
      { homeworks: [{ homework_name: "final.zip", status: "reviewing" }], current_date: 2000 },
      { homeworks: [], current_date: 2600 },
      { homeworks: [{ homework_name: "final.zip", status: "approved" }], current_date: 3200 },
    ];
    const fromDates: unknown[] = [];
    const http = axios.create({
      adapter: async (config): Promise<AxiosResponse> => {
        fromDates.push(config.params.from_date);
        const body = bodies.shift();
        return {
          status: 200,
          statusText: "OK",
          data: JSON.stringify(body),
          headers: {},
          config,
        };
      },
    });

    const { logger } = memoryLogger();
    const config = loadConfig(env);
    const sender = new FakeSender();
    const sleeps: number[] = [];
    const api = new PracticumApiClient({
      endpoint: config.endpoint,
      token: config.credentials.practicumToken,
      logger,
      http,
    });

    const bot: HomeworkBot = createHomeworkBot(config, {
      logger,
      sender,
      api,
      initialWatermark: 1000,
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 3) {
          bot.scheduler.stop();
        }
      },
    });

    await bot.scheduler.start();

    expect(fromDates).toEqual([1000, 2000, 2600]);
    expect(sleeps).toEqual([600_000, 600_000, 600_000]);
    expect(sender.sent).toEqual([
      {
        chatId: "777",
        text: 'Изменился статус проверки работы "final.zip". Работа взята на проверку ревьюером.',
      },
      { chatId: "777", text: "Статус отсутствует" },
      {
        chatId: "777",
        text: 'Изменился статус проверки работы "final.zip". Работа проверена: ревьюеру всё понравилось. Ура!',
      },
    ]);
    expect(bot.monitor.getState().watermark).toBe(3200);
  });
});
