/**
 * @ltfi-wsap/sdk — HTTP Client.
 *
 * Wraps fetch() with:
 * - Bearer token, JSON content negotiation and User-Agent headers
 * - Request ID generation
 * - Timeout handling
 * - Error normalization (status code -> error class)
 * - Structured request logging through pino
 *
 * Design:
 * - One request primitive; every client operation goes through it
 * - No retries and no caching: callers own resilience
 * - Custom fetch function for testing
 */

import type { Logger } from "pino";
import type { JsonValue } from "@ltfi-wsap/types";
import type { HttpMethod, QueryParams, RequestOptions, ResolvedClientConfig } from "./types.js";
import { APIError, NetworkError, ParseError, errorForStatus } from "./errors.js";

export const SDK_VERSION = "2.0.0";
export const USER_AGENT = `LTFI-WSAP-Node/${SDK_VERSION}`;

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `wsap-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Append query parameters to a path, skipping null and undefined values.
 */
function withQuery(path: string, query: QueryParams | undefined): string {
  if (query === undefined) {
    return path;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    params.append(key, String(value));
  }

  const qs = params.toString();
  return qs.length > 0 ? `${path}?${qs}` : path;
}

/**
 * Parse a 2xx body. An empty body is an empty object.
 */
function parseSuccessBody(text: string): JsonValue {
  if (text.trim().length === 0) {
    return {};
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError("Failed to parse response body as JSON", text, { cause: error });
  }
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the WSAP API.
 *
 * Returns parsed JSON for 2xx responses and throws a typed error for
 * everything else.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(config: ResolvedClientConfig) {
    this.baseUrl = config.baseUrl;
    this.apiKey = config.apiKey;
    this.timeout = config.timeout;
    this.fetchFn = config.fetchFn;
    this.logger = config.logger;
  }

  /**
   * Perform one request and return the parsed JSON body.
   *
   * @throws {AuthenticationError} on 401 or 403
   * @throws {NotFoundError} on 404
   * @throws {APIError} on any other non-2xx status
   * @throws {NetworkError} when no response was received, or on timeout
   * @throws {ParseError} when a 2xx body is not valid JSON
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const url = `${this.baseUrl}${withQuery(path, options.query)}`;
    const requestId = generateRequestId();

    const headers: Record<string, string> = {
      "Authorization": `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
      "Accept": "application/json",
      "User-Agent": USER_AGENT,
      "X-Request-Id": requestId,
    };

    const init: RequestInit = {
      method,
      headers,
    };

    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    const start = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, { ...init, signal: controller.signal });
      } catch (error) {
        const networkError = this.toNetworkError(error, controller.signal.aborted);
        this.logger.warn(
          { requestId, method, path, durationMs: Date.now() - start, err: networkError },
          `${method} ${path} failed without a response`,
        );
        throw networkError;
      }

      this.logger.debug(
        { requestId, method, path, status: response.status, durationMs: Date.now() - start },
        `${method} ${path} ${response.status}`,
      );

      const text = await this.readBody(response, controller.signal);

      if (!response.ok) {
        throw errorForStatus(response.status, text);
      }

      return parseSuccessBody(text);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Read the body of a response whose status has already arrived.
   *
   * A failed read keeps that status: non-2xx maps as usual with an empty
   * body, 2xx becomes an APIError with code RESPONSE_BODY_ERROR. Only a
   * timeout during the read is reported as a NetworkError.
   */
  private async readBody(response: Response, signal: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw this.toNetworkError(error, true);
      }
      if (!response.ok) {
        throw errorForStatus(response.status, "");
      }
      throw new APIError(
        `Failed to read response body (${response.status})`,
        response.status,
        "",
        "RESPONSE_BODY_ERROR",
        { cause: error },
      );
    }
  }

  private toNetworkError(error: unknown, aborted: boolean): NetworkError {
    if (aborted) {
      return new NetworkError("TIMEOUT", `Request timed out after ${this.timeout}ms`, {
        cause: error,
      });
    }
    return new NetworkError(
      "NETWORK_ERROR",
      error instanceof Error ? error.message : "Network error",
      { cause: error },
    );
  }
}
