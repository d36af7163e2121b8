/**
 * @ltfi-wsap/types — Shared payload types for the LTFI-WSAP client.
 *
 * Covers:
 * - Generic JSON values (what the client returns)
 * - Entities, verifications and WSAP disclosure documents
 * - Runtime guards for narrowing JSON into those shapes
 *
 * All types are readonly. Nothing here performs I/O.
 */

// JSON values
export type { JsonPrimitive, JsonArray, JsonObject, JsonValue } from "./json.js";

// Entity types
export type { Entity, EntityPage, EntityType } from "./entity.js";
export { ENTITY_TYPES } from "./entity.js";

// Verification types
export type { Verification, VerificationStatus } from "./verification.js";
export { VERIFICATION_STATUSES, DEFAULT_VERIFICATION_METHOD } from "./verification.js";

// WSAP types
export type { DisclosureLevel, WSAPData } from "./wsap.js";
export { DISCLOSURE_LEVELS, DEFAULT_DISCLOSURE_LEVEL } from "./wsap.js";

// Account types
export type { User, HealthStatus } from "./user.js";

// Runtime type guards
export {
  isJsonObject,
  isEntityType,
  isDisclosureLevel,
  isVerificationStatus,
  isEntity,
  isEntityPage,
  isVerification,
  isWSAPData,
  isUser,
  isHealthStatus,
} from "./guards.js";
