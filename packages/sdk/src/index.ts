/**
 * @ltfi-wsap/sdk — Client SDK for the LTFI-WSAP API.
 *
 * Entities, domain verification and WSAP disclosure documents over
 * HTTP. Uses native fetch; logs through pino.
 *
 * @packageDocumentation
 */

// Types
export type {
  WSAPClientOptions,
  ResolvedClientConfig,
  HttpMethod,
  QueryParams,
  RequestOptions,
} from "./types.js";

// Errors
export {
  WSAPError,
  APIError,
  AuthenticationError,
  NotFoundError,
  NetworkError,
  ParseError,
  isAPIError,
  isNetworkError,
  errorForStatus,
} from "./errors.js";

// Configuration
export {
  resolveClientConfig,
  ClientEnvSchema,
  ClientOptionsSchema,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  API_KEY_ENV_VAR,
} from "./config.js";
export type { ClientEnv } from "./config.js";

// HTTP Client
export { HttpClient, SDK_VERSION, USER_AGENT } from "./http-client.js";

// Client
export { WSAPClient } from "./client.js";

// Payload types and guards
export * from "@ltfi-wsap/types";
