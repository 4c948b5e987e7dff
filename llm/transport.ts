import type { Logger } from "../src/logger.js";
import { maskHeaders } from "../src/config.js";
import { errorMessage } from "../utils.js";

export const MODELS_TIMEOUT_SECONDS = 10;
export const GENERATE_TIMEOUT_SECONDS = 30;
export const CANCELLED_CAUSE = "Request cancelled";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type TransportOutcome =
  | { ok: true; status: number; body: string }
  | { ok: false; cause: string };

export interface TransportRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  timeoutSeconds: number;
  signal?: AbortSignal;
}

function describeFailure(error: unknown, timeoutSeconds: number, cancelled: boolean): string {
  if (cancelled) return CANCELLED_CAUSE;
  if (error instanceof Error && error.name === "TimeoutError") {
    return `Request timed out after ${timeoutSeconds}s`;
  }
  // undici hides the socket error (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
  return `${errorMessage(error)}${cause}`;
}

/**
 * One HTTP exchange, no retries. Resolves with the status and raw body text,
 * or with the reason no status was ever observed.
 */
export class HttpTransport {
  constructor(
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
  ) {}

  async send(req: TransportRequest): Promise<TransportOutcome> {
    const timeout = AbortSignal.timeout(req.timeoutSeconds * 1000);
    const signal = req.signal ? AbortSignal.any([req.signal, timeout]) : timeout;

    this.logger.info(`Preparing API request to: ${req.method} ${req.url}`);
    this.logger.debug("Request headers:", maskHeaders(req.headers));
    if (req.body !== undefined) this.logger.debug(`Request payload: ${JSON.stringify(req.body, null, 2)}`);

    let response: Response;
    try {
      response = await this.fetchImpl(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal,
      });
    } catch (error) {
      const cause = describeFailure(error, req.timeoutSeconds, Boolean(req.signal?.aborted));
      this.logger.error(`Request failed: ${cause}`);
      return { ok: false, cause };
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const cause = `Failed to read response body: ${describeFailure(error, req.timeoutSeconds, Boolean(req.signal?.aborted))}`;
      this.logger.error(cause);
      return { ok: false, cause };
    }

    this.logger.info(`Response status code: ${response.status}`);
    this.logger.debug(`Response payload: ${body}`);
    return { ok: true, status: response.status, body };
  }
}
