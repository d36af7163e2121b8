/**
 * @ltfi-wsap/sdk — WSAP Client.
 *
 * Main entry point for the SDK.
 *
 * Provides methods for:
 * - Entities (list, get, create, update, delete)
 * - Domain verification (initiate, verify)
 * - WSAP disclosure documents (generate, fetch public)
 * - Account and service status (current user, health)
 *
 * Design:
 * - Delegates to HttpClient for transport and error mapping
 * - Payloads are passed through as JSON; see @ltfi-wsap/types for guards
 * - Configuration is resolved once at construction and never changes
 */

import type { Logger } from "pino";
import type { JsonObject } from "@ltfi-wsap/types";
import {
  DEFAULT_DISCLOSURE_LEVEL,
  DEFAULT_VERIFICATION_METHOD,
  isJsonObject,
} from "@ltfi-wsap/types";
import { resolveClientConfig } from "./config.js";
import { ParseError, isAPIError } from "./errors.js";
import { HttpClient } from "./http-client.js";
import type { HttpMethod, QueryParams, RequestOptions, WSAPClientOptions } from "./types.js";

/**
 * LTFI-WSAP API client.
 *
 * Usage:
 * ```typescript
 * const client = new WSAPClient({ apiKey: "your-api-key" });
 *
 * const created = await client.createEntity({
 *   entity_type: "company",
 *   display_name: "Example Ltd",
 * });
 * await client.initiateVerification("example.com");
 * if (isEntity(created) && (await client.verifyDomain("example.com"))) {
 *   await client.generateWSAP(created.slug, "detailed");
 * }
 * ```
 */
export class WSAPClient {
  readonly apiKey: string;
  readonly baseUrl: string;
  /** Request timeout in milliseconds */
  readonly timeout: number;

  private readonly http: HttpClient;
  private readonly logger: Logger;

  /**
   * @param env - environment to read LTFI_WSAP_API_KEY and LTFI_WSAP_LOG_LEVEL from
   * @throws {AuthenticationError} if no API key is given or set in the environment
   */
  constructor(
    options: WSAPClientOptions = {},
    env: Record<string, string | undefined> = process.env,
  ) {
    const config = resolveClientConfig(options, env);
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout;
    this.logger = config.logger;
    this.http = new HttpClient(config);
  }

  // ===========================================================================
  // Entities
  // ===========================================================================

  /**
   * List entities. Filters (entity_type, is_verified, page, page_size, ...)
   * are sent as query parameters unchanged.
   */
  async listEntities(filters: QueryParams = {}): Promise<JsonObject> {
    return this.requestObject("GET", "/api/entities/", { query: filters });
  }

  /**
   * Get a single entity by ID or slug.
   */
  async getEntity(idOrSlug: string): Promise<JsonObject> {
    return this.requestObject("GET", `/api/entities/${encodeURIComponent(idOrSlug)}/`);
  }

  async createEntity(data: JsonObject): Promise<JsonObject> {
    return this.requestObject("POST", "/api/entities/", { body: data });
  }

  async updateEntity(idOrSlug: string, data: JsonObject): Promise<JsonObject> {
    return this.requestObject("PUT", `/api/entities/${encodeURIComponent(idOrSlug)}/`, {
      body: data,
    });
  }

  async deleteEntity(idOrSlug: string): Promise<void> {
    await this.http.request("DELETE", `/api/entities/${encodeURIComponent(idOrSlug)}/`);
  }

  // ===========================================================================
  // Verification
  // ===========================================================================

  /**
   * Start a domain ownership challenge. The response carries the TXT
   * record the entity must publish.
   */
  async initiateVerification(
    domain: string,
    method: string = DEFAULT_VERIFICATION_METHOD,
  ): Promise<JsonObject> {
    return this.requestObject("POST", "/api/verification/initiate/", {
      body: { domain, method },
    });
  }

  /**
   * Check whether a domain is verified.
   *
   * Meant to be polled: any APIError reads as `false`. That covers error
   * responses (401/403/404 included) and failures with no response at
   * all (NetworkError, statusCode 0). An unparsable 2xx body still throws
   * ParseError.
   */
  async verifyDomain(domain: string): Promise<boolean> {
    try {
      const result = await this.requestObject("POST", "/api/verification/verify/", {
        body: { domain },
      });
      return result.verified === true;
    } catch (error) {
      if (isAPIError(error)) {
        this.logger.debug(
          { domain, statusCode: error.statusCode, code: error.code },
          "Domain verification check failed",
        );
        return false;
      }
      throw error;
    }
  }

  // ===========================================================================
  // WSAP documents
  // ===========================================================================

  /**
   * Generate the WSAP document for an entity. The disclosure level
   * (BASIC, STANDARD, DETAILED, COMPLETE) is accepted in any case.
   */
  async generateWSAP(
    entityId: string,
    disclosureLevel: string = DEFAULT_DISCLOSURE_LEVEL,
  ): Promise<JsonObject> {
    return this.requestObject("POST", "/api/wsap/generate/", {
      body: {
        entity_id: entityId,
        disclosure_level: disclosureLevel.toUpperCase(),
      },
    });
  }

  /**
   * Fetch the published WSAP document for a domain.
   */
  async fetchWSAP(domain: string): Promise<JsonObject> {
    return this.requestObject("GET", `/api/wsap/public/${encodeURIComponent(domain)}/`);
  }

  // ===========================================================================
  // Account & status
  // ===========================================================================

  async getCurrentUser(): Promise<JsonObject> {
    return this.requestObject("GET", "/api/auth/me/");
  }

  async healthCheck(): Promise<JsonObject> {
    return this.requestObject("GET", "/api/health/");
  }

  private async requestObject(
    method: HttpMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<JsonObject> {
    const result = await this.http.request(method, path, options);
    if (!isJsonObject(result)) {
      throw new ParseError(
        `Expected a JSON object from ${method} ${path}`,
        JSON.stringify(result),
      );
    }
    return result;
  }
}
