/**
 * @ltfi-wsap/sdk — Error taxonomy.
 *
 * Every failure surfaced by the client is a WSAPError:
 * - APIError: the service answered with a non-2xx status, or never answered
 *   - AuthenticationError: 401/403, or no API key at construction
 *   - NotFoundError: 404
 *   - NetworkError: no response received (statusCode 0)
 * - ParseError: a 2xx body that is not the JSON the caller expects
 */

/**
 * Base class for all client errors.
 */
export class WSAPError extends Error {
  /** Machine-readable error code (e.g., "NOT_FOUND", "TIMEOUT") */
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WSAPError";
    this.code = code;
  }
}

/**
 * A request that did not complete with a 2xx response.
 */
export class APIError extends WSAPError {
  /** HTTP status code; 0 when no response was received */
  readonly statusCode: number;
  /** Raw response body text (empty when there was no response) */
  readonly responseBody: string;

  constructor(
    message: string,
    statusCode: number,
    responseBody = "",
    code = "API_ERROR",
    options?: ErrorOptions,
  ) {
    super(code, message, options);
    this.name = "APIError";
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, statusCode = 0, responseBody = "") {
    super(message, statusCode, responseBody, "AUTHENTICATION_ERROR");
    this.name = "AuthenticationError";
  }
}

export class NotFoundError extends APIError {
  constructor(message: string, responseBody = "") {
    super(message, 404, responseBody, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * The transport failed before any response arrived: connection refused,
 * DNS failure, or the request timed out.
 */
export class NetworkError extends APIError {
  readonly timedOut: boolean;

  constructor(code: "NETWORK_ERROR" | "TIMEOUT", message: string, options?: ErrorOptions) {
    super(message, 0, "", code, options);
    this.name = "NetworkError";
    this.timedOut = code === "TIMEOUT";
  }
}

/**
 * A successful response whose body could not be used.
 */
export class ParseError extends WSAPError {
  readonly responseBody: string;

  constructor(message: string, responseBody: string, options?: ErrorOptions) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
    this.responseBody = responseBody;
  }
}

export function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

/**
 * Map a received non-2xx response onto the error taxonomy.
 */
export function errorForStatus(statusCode: number, responseBody: string): APIError {
  const message = `API error (${statusCode}): ${responseBody}`;

  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(message, statusCode, responseBody);
  }
  if (statusCode === 404) {
    return new NotFoundError(message, responseBody);
  }
  return new APIError(message, statusCode, responseBody);
}
