/**
 * JSON value types.
 *
 * Everything that crosses the wire or gets digested is plain JSON.
 * Bigints and class instances never appear in these shapes.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}
