/**
 * @ltfi-wsap/sdk — SDK types.
 *
 * Types specific to the client layer. Payload types live in
 * @ltfi-wsap/types.
 */

import type { Logger } from "pino";
import type { JsonValue } from "@ltfi-wsap/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Options accepted by the WSAP client.
 */
export interface WSAPClientOptions {
  /** API key (falls back to the LTFI_WSAP_API_KEY environment variable) */
  readonly apiKey?: string | undefined;
  /** Base URL of the API (default: "https://api.ltfi.ai") */
  readonly baseUrl?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** pino logger; a silent one is created when omitted */
  readonly logger?: Logger | undefined;
}

/**
 * Configuration after defaults and environment fallbacks are applied.
 */
export interface ResolvedClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly fetchFn: typeof fetch;
  readonly logger: Logger;
}

// =============================================================================
// Requests
// =============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Query parameters; null and undefined values are left out of the URL.
 */
export type QueryParams = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface RequestOptions {
  readonly query?: QueryParams | undefined;
  readonly body?: JsonValue | undefined;
}
