/**
 * WSAP Disclosure Types
 *
 * A WSAP document is the versioned, public description of an entity,
 * generated at one of four disclosure levels. Higher levels include
 * more of the entity's data.
 */

import type { JsonObject } from "./json.js";

export type DisclosureLevel = "BASIC" | "STANDARD" | "DETAILED" | "COMPLETE";

export const DISCLOSURE_LEVELS: readonly DisclosureLevel[] = [
  "BASIC",
  "STANDARD",
  "DETAILED",
  "COMPLETE",
];

export const DEFAULT_DISCLOSURE_LEVEL: DisclosureLevel = "STANDARD";

/**
 * A generated or published WSAP document.
 */
export interface WSAPData {
  /** Document format version, e.g. "2.0" */
  readonly version: string;

  /** Entity ID or slug the document describes */
  readonly entity_id: string;

  readonly domain: string;
  readonly disclosure_level: DisclosureLevel;

  /** ISO 8601 timestamps; expires_at is null for documents that never expire */
  readonly generated_at: string;
  readonly expires_at: string | null;

  /** Disclosed fields, keyed by section */
  readonly data: JsonObject;
}
