// CHANGE: Statement terminator rule
// FORMAT THEOREM: always → ∀ s ∈ statements: terminated(s); never → ∀ s: ¬terminated(s)
// PURITY: CORE
// COMPLEXITY: O(s) where s = |statements|

import { Either, pipe } from "effect";

import type { Rule, RuleFinding, SemicolonOptions } from "../types/index.js";
import { findingForSpan } from "./findings.js";
import { enumOption, readOption, rejectUnknownKeys } from "./options.js";

const DEFAULT_OPTIONS: SemicolonOptions = { mode: "always" };

export const semicolonRule: Rule<"semicolon"> = {
	id: "semicolon",
	description: "Require or disallow semicolons at the end of statements",
	message: "Semicolon usage does not match the configured mode.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["mode"]),
			Either.flatMap(() =>
				Either.all({
					mode: readOption(
						raw,
						"mode",
						enumOption(["always", "never"] as const),
						DEFAULT_OPTIONS.mode,
					),
				}),
			),
		),
	check: (model, options) => {
		const findings: RuleFinding[] = [];
		for (const statement of model.statements) {
			const last = statement.lastToken;
			if (options.mode === "always" && !statement.terminated) {
				// Reported just after the last token, where the semicolon belongs
				findings.push({
					line: last.endLine,
					column: last.endColumn,
					message: "Missing semicolon.",
				});
			} else if (options.mode === "never" && statement.terminated) {
				findings.push(findingForSpan(last, "Extra semicolon."));
			}
		}
		return findings;
	},
};
