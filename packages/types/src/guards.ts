/**
 * Runtime Type Guards
 *
 * Narrowing functions for WSAP payloads. The client returns generic
 * JSON; callers that want typed views check the value here first.
 */

import type { JsonObject, JsonValue } from "./json.js";
import type { Entity, EntityPage, EntityType } from "./entity.js";
import type { Verification, VerificationStatus } from "./verification.js";
import type { DisclosureLevel, WSAPData } from "./wsap.js";
import type { HealthStatus, User } from "./user.js";
import { ENTITY_TYPES } from "./entity.js";
import { VERIFICATION_STATUSES } from "./verification.js";
import { DISCLOSURE_LEVELS } from "./wsap.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isNullableInteger(value: unknown): value is number | null {
  return value === null || Number.isInteger(value);
}

// =============================================================================
// JSON guards
// =============================================================================

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return isRecord(value);
}

// =============================================================================
// Enumeration guards
// =============================================================================

const ENTITY_TYPE_SET = new Set<string>(ENTITY_TYPES);
const DISCLOSURE_LEVEL_SET = new Set<string>(DISCLOSURE_LEVELS);
const VERIFICATION_STATUS_SET = new Set<string>(VERIFICATION_STATUSES);

export function isEntityType(value: unknown): value is EntityType {
  return typeof value === "string" && ENTITY_TYPE_SET.has(value);
}

export function isDisclosureLevel(value: unknown): value is DisclosureLevel {
  return typeof value === "string" && DISCLOSURE_LEVEL_SET.has(value);
}

export function isVerificationStatus(value: unknown): value is VerificationStatus {
  return typeof value === "string" && VERIFICATION_STATUS_SET.has(value);
}

// =============================================================================
// Entity guards
// =============================================================================

export function isEntity(value: unknown): value is Entity {
  if (!isRecord(value)) return false;
  return (
    Number.isInteger(value.id) &&
    typeof value.entity_id === "string" &&
    typeof value.entity_type === "string" &&
    typeof value.display_name === "string" &&
    typeof value.slug === "string" &&
    value.slug.length > 0 &&
    isNullableInteger(value.parent_entity) &&
    Number.isInteger(value.created_by) &&
    typeof value.is_active === "boolean" &&
    typeof value.is_published === "boolean" &&
    typeof value.is_verified === "boolean" &&
    isNullableString(value.template_id) &&
    typeof value.inherits_from_parent === "boolean" &&
    isRecord(value.wsap_data) &&
    typeof value.created_at === "string" &&
    typeof value.updated_at === "string"
  );
}

export function isEntityPage(value: unknown): value is EntityPage {
  if (!isRecord(value)) return false;
  return (
    Number.isInteger(value.count) &&
    (value.next === undefined || isNullableString(value.next)) &&
    (value.previous === undefined || isNullableString(value.previous)) &&
    Array.isArray(value.results) &&
    value.results.every(isEntity)
  );
}

// =============================================================================
// Verification guards
// =============================================================================

export function isVerification(value: unknown): value is Verification {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    Number.isInteger(value.entity) &&
    typeof value.domain === "string" &&
    typeof value.verification_token === "string" &&
    typeof value.txt_record_name === "string" &&
    typeof value.txt_record_value === "string" &&
    typeof value.verification_method === "string" &&
    isVerificationStatus(value.status) &&
    isNullableString(value.verified_at) &&
    Number.isInteger(value.attempts) &&
    Number.isInteger(value.max_attempts)
  );
}

// =============================================================================
// WSAP guards
// =============================================================================

export function isWSAPData(value: unknown): value is WSAPData {
  if (!isRecord(value)) return false;
  return (
    typeof value.version === "string" &&
    typeof value.entity_id === "string" &&
    typeof value.domain === "string" &&
    isDisclosureLevel(value.disclosure_level) &&
    typeof value.generated_at === "string" &&
    isNullableString(value.expires_at) &&
    isRecord(value.data)
  );
}

// =============================================================================
// Account guards
// =============================================================================

export function isUser(value: unknown): value is User {
  if (!isRecord(value)) return false;
  return (
    Number.isInteger(value.id) &&
    typeof value.username === "string" &&
    typeof value.email === "string"
  );
}

export function isHealthStatus(value: unknown): value is HealthStatus {
  return isRecord(value) && typeof value.status === "string";
}
