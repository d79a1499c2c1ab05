import axios, { type AxiosInstance } from "axios";
import {
  ApiRequestError,
  ApiStatusError,
  ResponseToJSONError,
  describeError,
} from "../errors";
import type { Logger } from "../logger";

export interface PracticumApiOptions {
  endpoint: string;
  token: string;
  timeoutMs?: number;
  logger: Logger;
  http?: AxiosInstance;
}

/**
 * Client for the homework statuses endpoint. One request per call, no
 * retries: the poll interval is the only backoff.
 */
class PracticumApiClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly options: PracticumApiOptions) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger;
  }

  /**
   * Requests homeworks updated since `fromDate` (unix seconds) and returns
   * the decoded JSON body as is. Shape checks are left to `checkResponse`.
   */
  async getApiAnswer(fromDate: number, signal?: AbortSignal): Promise<unknown> {
    let status: number;
    let body: unknown;

    this.logger.debug(
      `Requesting homework statuses from ${this.options.endpoint} since ${fromDate}`
    );
    try {
      const response = await this.http.get<unknown>(this.options.endpoint, {
        headers: { Authorization: `OAuth ${this.options.token}` },
        params: { from_date: fromDate },
        timeout: this.options.timeoutMs ?? 0,
        signal,
        responseType: "text",
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new ApiRequestError(describeError(error));
    }

    if (status !== 200) {
      throw new ApiStatusError(status);
    }

    return this.decode(body);
  }

  private decode(body: unknown): unknown {
    if (typeof body !== "string") {
      return body;
    }
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new ResponseToJSONError(describeError(error));
    }
  }
}

export { PracticumApiClient };
