// CHANGE: Typed readers for rule options coming from guidelint.config.json
// PURITY: CORE
// INVARIANT: Readers never throw; failures are Either.left(reason)
// COMPLEXITY: O(k) where k = |keys|

import { Either } from "effect";

import {
	describeJSONType,
	type JSONObject,
	type JSONValue,
} from "../types/index.js";

export type OptionReader<T> = (
	value: JSONValue,
	key: string,
) => Either.Either<T, string>;

export const booleanOption: OptionReader<boolean> = (value, key) =>
	typeof value === "boolean"
		? Either.right(value)
		: Either.left(`"${key}" must be a boolean, got ${describeJSONType(value)}`);

export const positiveIntegerOption: OptionReader<number> = (value, key) =>
	typeof value === "number" && Number.isInteger(value) && value > 0
		? Either.right(value)
		: Either.left(`"${key}" must be a positive integer`);

export const stringArrayOption: OptionReader<ReadonlyArray<string>> = (
	value,
	key,
) => {
	if (!Array.isArray(value)) {
		return Either.left(
			`"${key}" must be an array of strings, got ${describeJSONType(value)}`,
		);
	}
	const strings: string[] = [];
	for (const item of value) {
		if (typeof item !== "string") {
			return Either.left(`"${key}" must be an array of strings`);
		}
		strings.push(item);
	}
	return Either.right(strings);
};

/**
 * Reader accepting one of a closed set of string literals.
 *
 * @example
 * ```ts
 * enumOption(["single", "double"])("double", "style"); // Either.right("double")
 * ```
 */
export function enumOption<T extends string>(
	allowed: ReadonlyArray<T>,
): OptionReader<T> {
	return (value, key) => {
		const found = allowed.find((candidate) => candidate === value);
		return found === undefined
			? Either.left(
					`"${key}" must be one of ${allowed.map((a) => `"${a}"`).join(", ")}`,
				)
			: Either.right(found);
	};
}

/**
 * Reads `raw[key]` with `reader`, falling back when the key is absent.
 */
export function readOption<T>(
	raw: JSONObject,
	key: string,
	reader: OptionReader<T>,
	fallback: T,
): Either.Either<T, string> {
	const value = raw[key];
	return value === undefined ? Either.right(fallback) : reader(value, key);
}

/**
 * Fails on the first key that the rule does not declare.
 *
 * @invariant Either.isRight(result) ↔ keys(raw) ⊆ known
 */
export function rejectUnknownKeys(
	raw: JSONObject,
	known: ReadonlyArray<string>,
): Either.Either<JSONObject, string> {
	const unknown = Object.keys(raw).find((key) => !known.includes(key));
	return unknown === undefined
		? Either.right(raw)
		: Either.left(`unknown key "${unknown}"`);
}
