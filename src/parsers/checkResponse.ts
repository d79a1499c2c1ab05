import { EmptyResponseError, InvalidResponseTypeError } from "../errors";
import type { HomeworkResponse } from "../types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Checks the decoded API body against the documented shape:
 * `{ homeworks: [...], current_date: <unix seconds> }`.
 */
const checkResponse = (response: unknown): HomeworkResponse => {
  if (!isRecord(response)) {
    throw new InvalidResponseTypeError(
      "Homework API response is not an object"
    );
  }
  if (!("homeworks" in response)) {
    throw new EmptyResponseError("homeworks");
  }
  if (!("current_date" in response)) {
    throw new EmptyResponseError("current_date");
  }

  const { homeworks, current_date } = response;
  if (!Array.isArray(homeworks)) {
    throw new InvalidResponseTypeError(
      'Value under "homeworks" is not a list'
    );
  }
  if (typeof current_date !== "number" || !Number.isFinite(current_date)) {
    throw new InvalidResponseTypeError(
      'Value under "current_date" is not a unix timestamp'
    );
  }

  return { homeworks, current_date };
};

export default checkResponse;
