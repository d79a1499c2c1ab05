/**
 * Errors raised while polling the homework API.
 *
 * `recoverable` errors are logged and swallowed by the monitor; anything else
 * is also reported to the chat.
 */
export class HomeworkBotError extends Error {
  readonly recoverable: boolean;

  constructor(message: string, recoverable = false) {
    super(message);
    this.name = new.target.name;
    this.recoverable = recoverable;
  }
}

export class TokenError extends HomeworkBotError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class ApiRequestError extends HomeworkBotError {
  constructor(message: string) {
    super(`Request to the homework API failed: ${message}`, true);
  }
}

export class ApiStatusError extends HomeworkBotError {
  readonly status: number;

  constructor(status: number) {
    super(`Homework API responded with status ${status} instead of 200`, true);
    this.status = status;
  }
}

export class ResponseToJSONError extends HomeworkBotError {
  constructor(message: string) {
    super(`Homework API response is not valid JSON: ${message}`, true);
  }
}

export class EmptyResponseError extends HomeworkBotError {
  constructor(key: string) {
    super(`Homework API response has no "${key}" key`, true);
  }
}

// Shape errors: the API answered, but not with what the bot understands.
export class InvalidResponseTypeError extends HomeworkBotError {
  constructor(message: string) {
    super(message);
  }
}

export class MissingHomeworkKeyError extends HomeworkBotError {
  readonly key: string;

  constructor(key: string) {
    super(`Homework entry has no "${key}" key`);
    this.key = key;
  }
}

export class UnknownStatusError extends HomeworkBotError {
  readonly status: unknown;

  constructor(status: unknown) {
    super(`Unknown or empty homework status: ${String(status)}`);
    this.status = status;
  }
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof HomeworkBotError && error.recoverable;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
