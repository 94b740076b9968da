// CHANGE: Preferred quote character for string literals
// FORMAT THEOREM: ∀ string token s ∉ JSX attributes: quote(s) = preferred ∨ (avoidEscape ∧ preferred ∈ body(s))
// PURITY: CORE
// COMPLEXITY: O(n) where n = |tokens|

import { Either, pipe } from "effect";
import ts from "typescript";

import type { QuoteStyleOptions, Rule, RuleFinding } from "../types/index.js";
import { findingForSpan } from "./findings.js";
import {
	booleanOption,
	enumOption,
	readOption,
	rejectUnknownKeys,
} from "./options.js";

const DEFAULT_OPTIONS: QuoteStyleOptions = {
	style: "single",
	avoidEscape: true,
};

const QUOTE_CHARACTERS = { single: "'", double: '"' } as const;

export const quoteStyleRule: Rule<"quote-style"> = {
	id: "quote-style",
	description: "Enforce a single quote character for string literals",
	message: "Strings must use the configured quote character.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["style", "avoidEscape"]),
			Either.flatMap(() =>
				Either.all({
					style: readOption(
						raw,
						"style",
						enumOption(["single", "double"] as const),
						DEFAULT_OPTIONS.style,
					),
					avoidEscape: readOption(
						raw,
						"avoidEscape",
						booleanOption,
						DEFAULT_OPTIONS.avoidEscape,
					),
				}),
			),
		),
	check: (model, options) => {
		const preferred = QUOTE_CHARACTERS[options.style];
		const message = `Strings must use ${options.style}quote.`;
		const findings: RuleFinding[] = [];
		for (const token of model.tokens) {
			if (token.kind !== "string") continue;
			if (ts.isJsxAttribute(token.node.parent)) continue;
			if (token.text.startsWith(preferred)) continue;
			const body = token.text.slice(1, -1);
			if (options.avoidEscape && body.includes(preferred)) continue;
			findings.push(findingForSpan(token, message));
		}
		return findings;
	},
};
