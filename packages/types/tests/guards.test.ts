/**
 * Runtime type guard tests for @ltfi-wsap/types
 *
 * Guards accept payloads shaped like the service's responses and
 * reject malformed ones without throwing.
 */
import { describe, it, expect } from "vitest";
import {
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
} from "../src/guards.js";

// =============================================================================
// Fixtures
// =============================================================================

const ENTITY = {
  id: 1,
  entity_id: "test-uuid",
  entity_type: "company",
  display_name: "Test Company",
  slug: "test-company-123",
  parent_entity: null,
  created_by: 1,
  is_active: true,
  is_published: true,
  is_verified: false,
  template_id: null,
  inherits_from_parent: false,
  wsap_data: {},
  created_at: "2023-01-01T00:00:00Z",
  updated_at: "2023-01-01T00:00:00Z",
};

const VERIFICATION = {
  id: "verification-uuid",
  entity: 1,
  domain: "example.com",
  verification_token: "test-token",
  txt_record_name: "_wsap-verify.example.com",
  txt_record_value: "wsap-verify=test-token",
  verification_method: "dns",
  status: "pending",
  verified_at: null,
  attempts: 0,
  max_attempts: 3,
};

const WSAP = {
  version: "2.0",
  entity_id: "test-company-123",
  domain: "example.com",
  disclosure_level: "STANDARD",
  generated_at: "2023-01-01T00:00:00Z",
  expires_at: null,
  data: {},
};

// =============================================================================
// JSON guards
// =============================================================================

describe("isJsonObject", () => {
  it("accepts plain objects", () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject({})).toBe(true);
  });

  it("rejects arrays, null and scalars", () => {
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("text")).toBe(false);
    expect(isJsonObject(undefined)).toBe(false);
  });
});

// =============================================================================
// Enumeration guards
// =============================================================================

describe("enumeration guards", () => {
  it("accepts known entity types", () => {
    expect(isEntityType("company")).toBe(true);
    expect(isEntityType("individual")).toBe(true);
    expect(isEntityType("Company")).toBe(false);
    expect(isEntityType(1)).toBe(false);
  });

  it("accepts only upper-case disclosure levels", () => {
    expect(isDisclosureLevel("BASIC")).toBe(true);
    expect(isDisclosureLevel("COMPLETE")).toBe(true);
    expect(isDisclosureLevel("standard")).toBe(false);
    expect(isDisclosureLevel("FULL")).toBe(false);
  });

  it("accepts known verification statuses", () => {
    expect(isVerificationStatus("pending")).toBe(true);
    expect(isVerificationStatus("expired")).toBe(true);
    expect(isVerificationStatus("done")).toBe(false);
  });
});

// =============================================================================
// Entity guards
// =============================================================================

describe("isEntity", () => {
  it("accepts a valid entity", () => {
    expect(isEntity(ENTITY)).toBe(true);
  });

  it("accepts a subsidiary with a parent and template", () => {
    expect(isEntity({ ...ENTITY, parent_entity: 7, template_id: "tpl-1" })).toBe(true);
  });

  it("rejects an empty slug", () => {
    expect(isEntity({ ...ENTITY, slug: "" })).toBe(false);
  });

  it("rejects a string id", () => {
    expect(isEntity({ ...ENTITY, id: "1" })).toBe(false);
  });

  it("rejects an array wsap_data", () => {
    expect(isEntity({ ...ENTITY, wsap_data: [] })).toBe(false);
  });

  it("rejects missing flags", () => {
    const { is_verified: _omitted, ...rest } = ENTITY;
    expect(isEntity(rest)).toBe(false);
  });

  it("rejects null and non-objects", () => {
    expect(isEntity(null)).toBe(false);
    expect(isEntity("entity")).toBe(false);
  });
});

describe("isEntityPage", () => {
  it("accepts a page of entities", () => {
    expect(isEntityPage({ count: 1, results: [ENTITY] })).toBe(true);
  });

  it("accepts null next/previous links", () => {
    expect(isEntityPage({ count: 0, next: null, previous: null, results: [] })).toBe(true);
  });

  it("rejects a page holding a malformed entity", () => {
    expect(isEntityPage({ count: 1, results: [{ id: 1 }] })).toBe(false);
  });

  it("rejects a page without results", () => {
    expect(isEntityPage({ count: 0 })).toBe(false);
  });
});

// =============================================================================
// Verification guards
// =============================================================================

describe("isVerification", () => {
  it("accepts a pending verification", () => {
    expect(isVerification(VERIFICATION)).toBe(true);
  });

  it("accepts a verified challenge with a timestamp", () => {
    expect(
      isVerification({ ...VERIFICATION, status: "verified", verified_at: "2023-01-02T00:00:00Z" }),
    ).toBe(true);
  });

  it("rejects an unknown status", () => {
    expect(isVerification({ ...VERIFICATION, status: "unknown" })).toBe(false);
  });

  it("rejects fractional attempt counters", () => {
    expect(isVerification({ ...VERIFICATION, attempts: 0.5 })).toBe(false);
  });
});

// =============================================================================
// WSAP guards
// =============================================================================

describe("isWSAPData", () => {
  it("accepts a generated document", () => {
    expect(isWSAPData(WSAP)).toBe(true);
  });

  it("rejects a lower-case disclosure level", () => {
    expect(isWSAPData({ ...WSAP, disclosure_level: "standard" })).toBe(false);
  });

  it("rejects a missing data section", () => {
    expect(isWSAPData({ ...WSAP, data: null })).toBe(false);
  });
});

// =============================================================================
// Account guards
// =============================================================================

describe("account guards", () => {
  it("accepts a user with extra fields", () => {
    expect(isUser({ id: 3, username: "tester", email: "tester@example.com", is_staff: false })).toBe(true);
  });

  it("rejects a user without email", () => {
    expect(isUser({ id: 3, username: "tester" })).toBe(false);
  });

  it("accepts a health status", () => {
    expect(isHealthStatus({ status: "ok", version: "2.0.0" })).toBe(true);
    expect(isHealthStatus({ healthy: true })).toBe(false);
  });
});
