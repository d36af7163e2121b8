/**
 * JSON Value Types
 *
 * The client passes payloads through untouched. These types describe
 * what a parsed JSON document can be, without asserting any shape.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
