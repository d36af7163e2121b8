/**
 * @ltfi-wsap/sdk — Configuration.
 *
 * Resolves client options against environment variables and validates
 * them with Zod. The API key is mandatory: a client is never built
 * without one.
 */

import { z } from "zod";
import { pino } from "pino";
import { AuthenticationError } from "./errors.js";
import type { ResolvedClientConfig, WSAPClientOptions } from "./types.js";

export const DEFAULT_BASE_URL = "https://api.ltfi.ai";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const API_KEY_ENV_VAR = "LTFI_WSAP_API_KEY";

// =============================================================================
// Schemas
// =============================================================================

export const ClientEnvSchema = z.object({
  LTFI_WSAP_API_KEY: z.string().optional(),
  // Case-insensitive; blank means unset.
  LTFI_WSAP_LOG_LEVEL: z.preprocess(
    (value) => {
      if (typeof value !== "string") return value;
      const level = value.trim().toLowerCase();
      return level === "" ? undefined : level;
    },
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("silent"),
  ),
});

export type ClientEnv = z.infer<typeof ClientEnvSchema>;

export const ClientOptionsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

// =============================================================================
// Resolution
// =============================================================================

function resolveApiKey(explicit: string | undefined, env: ClientEnv): string {
  if (explicit !== undefined && explicit !== "") {
    return explicit;
  }
  const fromEnv = env.LTFI_WSAP_API_KEY;
  if (fromEnv !== undefined && fromEnv !== "") {
    return fromEnv;
  }
  throw new AuthenticationError(
    `API key required: set ${API_KEY_ENV_VAR} or provide apiKey`,
  );
}

/**
 * Apply defaults and environment fallbacks to client options.
 *
 * @throws {AuthenticationError} if no API key is available
 * @throws {z.ZodError} if baseUrl, timeout or the log level are invalid
 */
export function resolveClientConfig(
  options: WSAPClientOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedClientConfig {
  const parsedEnv = ClientEnvSchema.parse(env);
  const apiKey = resolveApiKey(options.apiKey, parsedEnv);
  const { baseUrl, timeout } = ClientOptionsSchema.parse({
    baseUrl: options.baseUrl,
    timeout: options.timeout,
  });

  return {
    apiKey,
    baseUrl,
    timeout,
    fetchFn: options.fetchFn ?? globalThis.fetch.bind(globalThis),
    logger: options.logger ?? pino({ name: "ltfi-wsap", level: parsedEnv.LTFI_WSAP_LOG_LEVEL }),
  };
}
