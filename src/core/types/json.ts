// CHANGE: JSON value model shared by the config loader and rule option parsers
// PURITY: CORE
// INVARIANT: Every value is serializable with JSON.stringify

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export interface JSONObject {
	readonly [key: string]: JSONValue;
}

/**
 * Type guard to check if value is a JSON object.
 *
 * @returns True if value is a non-null, non-array object
 */
export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Type guard to check if value is an array.
 */
export function isJSONArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * Readable name of a JSON value's type for error messages.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeJSONType(value: JSONValue): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}
