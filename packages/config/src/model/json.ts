export type JsonPrimitive = string | number | boolean | null;

/**
 * A JSON document as held by constant steps.
 *
 * Numbers are IEEE 754 doubles: integers beyond ±(2^53 - 1) come back from
 * JSON or YAML text as the nearest double (`12345678901234567890` reads as
 * `12345678901234567000`). Non-finite numbers are not JSON and fail decoding.
 */
export type JsonValue = JsonPrimitive | readonly JsonValue[] | { readonly [key: string]: JsonValue };
