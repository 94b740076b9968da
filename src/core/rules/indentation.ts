// CHANGE: Leading whitespace consistency rule
// FORMAT THEOREM: ∀ non-blank line l ∉ continuation: chars(indent(l)) ⊆ {style} ∧ (space → |indent(l)| mod size = 0)
// PURITY: CORE
// INVARIANT: Lines inside multi-line tokens or comments are never reported
// COMPLEXITY: O(n) where n = |text|

import { Either, pipe } from "effect";

import type {
	IndentationOptions,
	Rule,
	RuleFinding,
	SyntacticModel,
} from "../types/index.js";
import {
	enumOption,
	positiveIntegerOption,
	readOption,
	rejectUnknownKeys,
} from "./options.js";

const DEFAULT_OPTIONS: IndentationOptions = { style: "space", size: 2 };

const LEADING_WHITESPACE = /^[ \t]*/u;

/**
 * 1-based lines whose start lies inside a token or comment opened on an earlier line.
 *
 * @complexity O(n) where n = |tokens| + |comments| + Σ spanned lines
 */
function continuationLines(model: SyntacticModel): ReadonlySet<number> {
	const lines = new Set<number>();
	for (const span of [...model.tokens, ...model.comments]) {
		for (let line = span.line + 1; line <= span.endLine; line += 1) {
			lines.add(line);
		}
	}
	return lines;
}

function indentationProblem(
	indent: string,
	options: IndentationOptions,
): string | null {
	if (options.style === "tab") {
		return indent.includes(" ")
			? "Expected indentation with tabs but found spaces."
			: null;
	}
	if (indent.includes("\t")) {
		return "Expected indentation with spaces but found a tab.";
	}
	return indent.length % options.size === 0
		? null
		: `Expected indentation to be a multiple of ${options.size} spaces but found ${indent.length}.`;
}

export const indentationRule: Rule<"indentation"> = {
	id: "indentation",
	description: "Enforce a consistent indentation character and width",
	message: "Inconsistent indentation.",
	defaultSeverity: "warning",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["style", "size"]),
			Either.flatMap(() =>
				Either.all({
					style: readOption(
						raw,
						"style",
						enumOption(["space", "tab"] as const),
						DEFAULT_OPTIONS.style,
					),
					size: readOption(
						raw,
						"size",
						positiveIntegerOption,
						DEFAULT_OPTIONS.size,
					),
				}),
			),
		),
	check: (model, options) => {
		const skipped = continuationLines(model);
		const findings: RuleFinding[] = [];
		model.lines.forEach((text, index) => {
			const line = index + 1;
			if (skipped.has(line)) return;
			const indent = LEADING_WHITESPACE.exec(text)?.[0] ?? "";
			if (indent.length === text.length) return;
			const message = indentationProblem(indent, options);
			if (message === null) return;
			findings.push({
				line,
				column: 1,
				endLine: line,
				endColumn: indent.length + 1,
				message,
			});
		});
		return findings;
	},
};
