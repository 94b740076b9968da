// CHANGE: Pure validation of guidelint.config.json into a LinterConfig
// PURITY: CORE
// INVARIANT: Either.right only for a fully valid document; every rule has a setting
// COMPLEXITY: O(r + k) where r = |rules|, k = |keys|

import { Either, pipe } from "effect";

import {
	BUILTIN_RULES,
	isRuleId,
	readOption,
	rejectUnknownKeys,
	stringArrayOption,
} from "../rules/index.js";
import type { OptionReader } from "../rules/index.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	type LinterConfig,
	type ResolvedRuleSettings,
	type Rule,
	type RuleId,
	type RuleRegistry,
	type RuleSetting,
	type RuleSeverity,
} from "../types/index.js";

export const DEFAULT_EXTENSIONS: ReadonlyArray<string> = [
	".js",
	".mjs",
	".cjs",
	".jsx",
];

const TOP_LEVEL_KEYS = ["extensions", "ignore", "rules"] as const;

const SEVERITY_ALIASES: ReadonlyMap<string | number, RuleSeverity> = new Map<
	string | number,
	RuleSeverity
>([
	["off", "off"],
	["warning", "warning"],
	["warn", "warning"],
	["error", "error"],
	[0, "off"],
	[1, "warning"],
	[2, "error"],
]);

const extensionsOption: OptionReader<ReadonlyArray<string>> = (value, key) =>
	pipe(
		stringArrayOption(value, key),
		Either.flatMap((extensions) =>
			extensions.every((extension) => /^\.[^./\\]+$/u.test(extension))
				? Either.right(extensions.map((extension) => extension.toLowerCase()))
				: Either.left(`"${key}" entries must look like ".js"`),
		),
	);

/**
 * Parses a configured severity: "off" | "warning" | "warn" | "error" | 0 | 1 | 2.
 *
 * @pure true
 */
export function parseSeverity(
	value: JSONValue,
): Either.Either<RuleSeverity, string> {
	const severity =
		typeof value === "string" || typeof value === "number"
			? SEVERITY_ALIASES.get(value)
			: undefined;
	return severity === undefined
		? Either.left(
				`invalid severity ${JSON.stringify(value)} (expected "off", "warning" or "error")`,
			)
		: Either.right(severity);
}

export function defaultRuleSetting<K extends RuleId>(
	rule: Rule<K>,
): RuleSetting<K> {
	return { severity: rule.defaultSeverity, options: rule.defaultOptions };
}

/**
 * Resolves one entry of the "rules" object.
 *
 * Accepted shapes: `"error"`, `["warning"]`, `["error", { ...options }]`.
 */
export function resolveRuleSetting<K extends RuleId>(
	rule: Rule<K>,
	raw: JSONValue | undefined,
): Either.Either<RuleSetting<K>, string> {
	const withContext = Either.mapLeft(
		(reason: string) => `rule "${rule.id}": ${reason}`,
	);
	if (raw === undefined) return Either.right(defaultRuleSetting(rule));
	if (!isJSONArray(raw)) {
		return pipe(
			parseSeverity(raw),
			Either.map((severity) => ({ severity, options: rule.defaultOptions })),
			withContext,
		);
	}
	const [severityValue, optionsValue, ...rest] = raw;
	if (severityValue === undefined || rest.length > 0) {
		return withContext(
			Either.left("expected [severity] or [severity, options]"),
		);
	}
	return pipe(
		parseSeverity(severityValue),
		Either.flatMap((severity): Either.Either<RuleSetting<K>, string> => {
			if (optionsValue === undefined) {
				return Either.right({ severity, options: rule.defaultOptions });
			}
			if (!isJSONObject(optionsValue)) {
				return Either.left("options must be an object");
			}
			return pipe(
				rule.parseOptions(optionsValue),
				Either.map((options) => ({ severity, options })),
			);
		}),
		withContext,
	);
}

/**
 * Built-in settings: every rule at its default severity and options.
 */
export function defaultRuleSettings(
	registry: RuleRegistry = BUILTIN_RULES,
): ResolvedRuleSettings {
	return {
		"naming-convention": defaultRuleSetting(registry["naming-convention"]),
		"brace-style": defaultRuleSetting(registry["brace-style"]),
		"quote-style": defaultRuleSetting(registry["quote-style"]),
		indentation: defaultRuleSetting(registry.indentation),
		semicolon: defaultRuleSetting(registry.semicolon),
		eqeqeq: defaultRuleSetting(registry.eqeqeq),
		"no-implicit-globals": defaultRuleSetting(registry["no-implicit-globals"]),
	};
}

export function resolveRuleSettings(
	raw: JSONValue | undefined,
	registry: RuleRegistry = BUILTIN_RULES,
): Either.Either<ResolvedRuleSettings, string> {
	if (raw === undefined) return Either.right(defaultRuleSettings(registry));
	if (!isJSONObject(raw)) return Either.left('"rules" must be an object');
	const unknownId = Object.keys(raw).find((id) => !isRuleId(id));
	if (unknownId !== undefined) {
		return Either.left(`unknown rule "${unknownId}"`);
	}
	const rules: JSONObject = raw;
	return Either.all({
		"naming-convention": resolveRuleSetting(
			registry["naming-convention"],
			rules["naming-convention"],
		),
		"brace-style": resolveRuleSetting(
			registry["brace-style"],
			rules["brace-style"],
		),
		"quote-style": resolveRuleSetting(
			registry["quote-style"],
			rules["quote-style"],
		),
		indentation: resolveRuleSetting(registry.indentation, rules["indentation"]),
		semicolon: resolveRuleSetting(registry.semicolon, rules["semicolon"]),
		eqeqeq: resolveRuleSetting(registry.eqeqeq, rules["eqeqeq"]),
		"no-implicit-globals": resolveRuleSetting(
			registry["no-implicit-globals"],
			rules["no-implicit-globals"],
		),
	});
}

export function defaultLinterConfig(
	registry: RuleRegistry = BUILTIN_RULES,
): LinterConfig {
	return {
		extensions: DEFAULT_EXTENSIONS,
		ignore: [],
		rules: defaultRuleSettings(registry),
	};
}

/**
 * Validates a parsed configuration document.
 *
 * @param value - Parsed JSON of guidelint.config.json
 * @returns Either.right(config) or Either.left(reason)
 *
 * @pure true
 * @invariant Either.isRight(result) → ∀id ∈ RULE_IDS: result.rules[id] defined
 *
 * @example
 * ```ts
 * resolveLinterConfig({ rules: { semicolon: ["error", { mode: "never" }] } });
 * // Either.right({ extensions: [".js", ...], ignore: [], rules: { ... } })
 * ```
 */
export function resolveLinterConfig(
	value: JSONValue,
	registry: RuleRegistry = BUILTIN_RULES,
): Either.Either<LinterConfig, string> {
	if (!isJSONObject(value)) {
		return Either.left("configuration must be a JSON object");
	}
	return pipe(
		rejectUnknownKeys(value, TOP_LEVEL_KEYS),
		Either.flatMap(() =>
			Either.all({
				extensions: readOption(
					value,
					"extensions",
					extensionsOption,
					DEFAULT_EXTENSIONS,
				),
				ignore: readOption(value, "ignore", stringArrayOption, []),
				rules: resolveRuleSettings(value["rules"], registry),
			}),
		),
	);
}
