/**
 * Verification Types
 *
 * Domain ownership is proven through a challenge, typically a DNS TXT
 * record the entity publishes. The service tracks how many checks were
 * attempted against the challenge.
 */

export type VerificationStatus = "pending" | "verified" | "failed" | "expired";

export const VERIFICATION_STATUSES: readonly VerificationStatus[] = [
  "pending",
  "verified",
  "failed",
  "expired",
];

/** Default challenge method for initiateVerification. */
export const DEFAULT_VERIFICATION_METHOD = "dns_txt";

/**
 * A verification challenge as returned by the initiate endpoint.
 */
export interface Verification {
  readonly id: string;

  /** ID of the entity claiming the domain */
  readonly entity: number;

  readonly domain: string;
  readonly verification_token: string;

  /** DNS record the entity must publish */
  readonly txt_record_name: string;
  readonly txt_record_value: string;

  readonly verification_method: string;
  readonly status: VerificationStatus;
  readonly verified_at: string | null;

  readonly attempts: number;
  readonly max_attempts: number;
}
