/**
 * Entity Types
 *
 * An Entity is an organisation or individual registered with the
 * WSAP service. Entities own verified domains and the disclosure
 * document published for them.
 */

import type { JsonObject } from "./json.js";

/**
 * Kinds of entity the service registers.
 */
export type EntityType = "company" | "organization" | "individual";

export const ENTITY_TYPES: readonly EntityType[] = ["company", "organization", "individual"];

/**
 * An Entity as returned by the entities endpoints.
 */
export interface Entity {
  /** Numeric primary key */
  readonly id: number;

  /** Stable public identifier (UUID) */
  readonly entity_id: string;

  readonly entity_type: string;

  /** Human-readable name */
  readonly display_name: string;

  /** URL-safe identifier, accepted anywhere an ID is */
  readonly slug: string;

  /** Parent entity ID for subsidiaries, null for top-level entities */
  readonly parent_entity: number | null;

  /** ID of the user that created the entity */
  readonly created_by: number;

  readonly is_active: boolean;
  readonly is_published: boolean;
  readonly is_verified: boolean;

  readonly template_id: string | null;
  readonly inherits_from_parent: boolean;

  /** Disclosure document source data (opaque to the client) */
  readonly wsap_data: JsonObject;

  /** ISO 8601 timestamps */
  readonly created_at: string;
  readonly updated_at: string;
}

/**
 * One page of the entity list.
 */
export interface EntityPage {
  readonly count: number;
  readonly next?: string | null | undefined;
  readonly previous?: string | null | undefined;
  readonly results: readonly Entity[];
}
