import { HOMEWORK_VERDICTS } from "../config";
import { MissingHomeworkKeyError, UnknownStatusError } from "../errors";
import type { HomeworkStatus } from "../types";

export const NO_STATUS_MESSAGE = "Статус отсутствует";

type Verdicts = Readonly<Record<HomeworkStatus, string>>;

const isKnownStatus = (
  status: unknown,
  verdicts: Verdicts
): status is HomeworkStatus =>
  typeof status === "string" && Object.hasOwn(verdicts, status);

/**
 * Renders the chat message for a single homework entry.
 */
const parseStatus = (
  homework: unknown,
  verdicts: Verdicts = HOMEWORK_VERDICTS
): string => {
  if (typeof homework !== "object" || homework === null) {
    throw new MissingHomeworkKeyError("homework_name");
  }
  if (!("homework_name" in homework)) {
    throw new MissingHomeworkKeyError("homework_name");
  }
  if (!("status" in homework)) {
    throw new MissingHomeworkKeyError("status");
  }

  const { homework_name: name, status } = homework;
  if (!isKnownStatus(status, verdicts)) {
    throw new UnknownStatusError(status);
  }

  return `Изменился статус проверки работы "${String(name)}". ${verdicts[status]}`;
};

export default parseStatus;
