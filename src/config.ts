import { z } from "zod";
import { TokenError } from "./errors";
import type { Logger, LogLevel } from "./logger";
import type { Credentials, HomeworkStatus } from "./types";

export const DEFAULT_ENDPOINT =
  "https://practicum.yandex.ru/api/user_api/homework_statuses/";

export const HOMEWORK_VERDICTS: Readonly<Record<HomeworkStatus, string>> =
  Object.freeze({
    approved: "Работа проверена: ревьюеру всё понравилось. Ура!",
    reviewing: "Работа взята на проверку ревьюером.",
    rejected: "Работа проверена: у ревьюера есть замечания.",
  });

export const CREDENTIAL_VARIABLES = [
  "PRACTICUM_TOKEN",
  "TELEGRAM_TOKEN",
  "TELEGRAM_CHAT_ID",
] as const;

const credential = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? "");

const envSchema = z.object({
  PRACTICUM_TOKEN: credential,
  TELEGRAM_TOKEN: credential,
  TELEGRAM_CHAT_ID: credential,
  PRACTICUM_ENDPOINT: z
    .string()
    .url("PRACTICUM_ENDPOINT must be a valid URL")
    .default(DEFAULT_ENDPOINT),
  RETRY_PERIOD: z.coerce
    .number()
    .int("RETRY_PERIOD must be a whole number of seconds")
    .positive("RETRY_PERIOD must be positive")
    .default(600),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_FILE: z.string().min(1).default("log.log"),
  LOG_LEVEL: z
    .enum(["debug", "info", "warning", "error", "critical"])
    .default("debug"),
});

export interface BotConfig {
  readonly credentials: Readonly<Credentials>;
  readonly endpoint: string;
  readonly retryPeriodMs: number;
  readonly requestTimeoutMs: number;
  readonly logFile: string;
  readonly logLevel: LogLevel;
  readonly verdicts: Readonly<Record<HomeworkStatus, string>>;
}

type Env = Record<string, string | undefined>;

/**
 * Reads the environment into a frozen config. Credentials may come back empty
 * here; `checkTokens` decides whether that is fatal.
 */
export function loadConfig(env: Env = process.env): BotConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const formatted = parsed.error.errors
      .map((err) => `${err.path.join(".") || "env"}: ${err.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${formatted}`);
  }

  const data = parsed.data;
  return Object.freeze({
    credentials: Object.freeze({
      practicumToken: data.PRACTICUM_TOKEN,
      telegramToken: data.TELEGRAM_TOKEN,
      telegramChatId: data.TELEGRAM_CHAT_ID,
    }),
    endpoint: data.PRACTICUM_ENDPOINT,
    retryPeriodMs: data.RETRY_PERIOD * 1000,
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    logFile: data.LOG_FILE,
    logLevel: data.LOG_LEVEL,
    verdicts: HOMEWORK_VERDICTS,
  });
}

/**
 * Fails fast when any credential is missing. Logs at critical level and
 * throws `TokenError` naming every missing variable.
 */
export function checkTokens(credentials: Credentials, logger: Logger): true {
  const values: Record<(typeof CREDENTIAL_VARIABLES)[number], string> = {
    PRACTICUM_TOKEN: credentials.practicumToken,
    TELEGRAM_TOKEN: credentials.telegramToken,
    TELEGRAM_CHAT_ID: credentials.telegramChatId,
  };
  const missing = CREDENTIAL_VARIABLES.filter((name) => !values[name]);

  if (missing.length > 0) {
    const error = new TokenError(missing);
    logger.critical(error.message);
    throw error;
  }
  return true;
}
