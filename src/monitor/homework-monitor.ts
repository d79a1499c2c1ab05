import { HOMEWORK_VERDICTS } from "../config";
import { describeError, isRecoverable } from "../errors";
import type { Logger } from "../logger";
import checkResponse from "../parsers/checkResponse";
import parseStatus, { NO_STATUS_MESSAGE } from "../parsers/parseStatus";
import type { HomeworkStatus, PollState } from "../types";

export const FAILURE_PREFIX = "Сбой в работе программы";

export interface HomeworkApi {
  getApiAnswer(fromDate: number, signal?: AbortSignal): Promise<unknown>;
}

export interface Notifier {
  sendMessage(text: string): Promise<boolean>;
}

export interface MonitorOptions {
  api: HomeworkApi;
  notifier: Notifier;
  logger: Logger;
  verdicts?: Readonly<Record<HomeworkStatus, string>>;
  /** Unix seconds; defaults to the current time. */
  initialWatermark?: number;
}

export type TickOutcome = "notified" | "unchanged" | "failed";

class HomeworkStatusMonitor {
  private state: PollState;
  private readonly logger: Logger;

  constructor(private readonly options: MonitorOptions) {
    this.logger = options.logger;
    this.state = {
      watermark: options.initialWatermark ?? Math.floor(Date.now() / 1000),
      lastStatusMessage: "",
    };
  }

  /**
   * One poll: query, validate, render the latest status and notify when it
   * differs from the last one sent. The watermark moves to the response's
   * `current_date` only after a notification.
   *
   * Never throws. Recoverable failures are only logged; any other failure is
   * logged and reported to the chat. An aborted `signal` cancels the request
   * and the tick ends quietly.
   */
  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    try {
      const answer = await this.options.api.getApiAnswer(
        this.state.watermark,
        signal
      );
      const response = checkResponse(answer);

      const message =
        response.homeworks.length > 0
          ? parseStatus(response.homeworks[0], this.options.verdicts ?? HOMEWORK_VERDICTS)
          : NO_STATUS_MESSAGE;

      if (message === this.state.lastStatusMessage) {
        this.logger.debug(`Status unchanged: ${message}`);
        return "unchanged";
      }

      // Recorded even when the send fails, so a status is never resent.
      const sent = await this.options.notifier.sendMessage(message);
      this.state = {
        watermark: response.current_date,
        lastStatusMessage: message,
      };
      if (sent) {
        this.logger.info(`Status change reported: ${message}`);
      } else {
        this.logger.warning(`Status change not delivered: ${message}`);
      }
      return "notified";
    } catch (error) {
      if (signal?.aborted) {
        this.logger.info("Poll interrupted by shutdown");
        return "failed";
      }
      await this.reportFailure(error);
      return "failed";
    }
  }

  getState(): PollState {
    return { ...this.state };
  }

  private async reportFailure(error: unknown): Promise<void> {
    const reason = describeError(error);
    this.logger.error(`Poll failed: ${reason}`);

    if (isRecoverable(error)) {
      return;
    }
    await this.options.notifier.sendMessage(`${FAILURE_PREFIX}: ${reason}`);
  }
}

export { HomeworkStatusMonitor };
