/**
 * Account types returned by the auth and health endpoints.
 */

import type { JsonValue } from "./json.js";

export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly [field: string]: JsonValue | undefined;
}

export interface HealthStatus {
  readonly status: string;
  readonly [field: string]: JsonValue | undefined;
}
