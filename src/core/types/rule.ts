// CHANGE: Rule contract and per-rule option types
// PURITY: CORE
// INVARIANT: Rules are pure functions of (SyntacticModel, options); registered rules are frozen
// COMPLEXITY: O(1)

import type { Either } from "effect";

import type { JSONObject } from "./json.js";
import type { RuleFinding, RuleSeverity, Severity } from "./messages.js";
import type { SyntacticModel } from "./syntax.js";

export interface NamingConventionOptions {
	readonly allowLeadingUnderscore: boolean;
	readonly allowUpperCaseConstants: boolean;
	readonly ignore: ReadonlyArray<string>;
}

export interface BraceStyleOptions {
	readonly style: "1tbs" | "allman";
	readonly allowSingleLine: boolean;
}

export interface QuoteStyleOptions {
	readonly style: "single" | "double";
	readonly avoidEscape: boolean;
}

export interface IndentationOptions {
	readonly style: "space" | "tab";
	readonly size: number;
}

export interface SemicolonOptions {
	readonly mode: "always" | "never";
}

export interface EqeqeqOptions {
	readonly allowNull: boolean;
}

export interface NoImplicitGlobalsOptions {
	readonly allow: ReadonlyArray<string>;
	readonly sourceType: "auto" | "script" | "module";
}

/**
 * Option type of every built-in rule, keyed by rule id.
 */
export interface RuleOptionsMap {
	readonly "naming-convention": NamingConventionOptions;
	readonly "brace-style": BraceStyleOptions;
	readonly "quote-style": QuoteStyleOptions;
	readonly indentation: IndentationOptions;
	readonly semicolon: SemicolonOptions;
	readonly eqeqeq: EqeqeqOptions;
	readonly "no-implicit-globals": NoImplicitGlobalsOptions;
}

export type RuleId = keyof RuleOptionsMap;

/**
 * A named, independent check.
 *
 * @invariant check is pure: same (model, options) → same findings
 */
export interface Rule<K extends RuleId = RuleId> {
	readonly id: K;
	readonly description: string;
	/** Default message for findings that carry none. */
	readonly message: string;
	readonly defaultSeverity: Severity;
	readonly defaultOptions: RuleOptionsMap[K];
	/** Merges a partial options object over the defaults. Left = reason. */
	readonly parseOptions: (
		raw: JSONObject,
	) => Either.Either<RuleOptionsMap[K], string>;
	readonly check: (
		model: SyntacticModel,
		options: RuleOptionsMap[K],
	) => ReadonlyArray<RuleFinding>;
}

/**
 * Registry of all rules; indexing with a generic id keeps rule and options correlated.
 */
export type RuleRegistry = { readonly [K in RuleId]: Rule<K> };

export interface RuleSetting<K extends RuleId> {
	readonly severity: RuleSeverity;
	readonly options: RuleOptionsMap[K];
}

export type ResolvedRuleSettings = { readonly [K in RuleId]: RuleSetting<K> };

/** Any registered rule, with its id and options still correlated. */
export type AnyRule = RuleRegistry[RuleId];
