// CHANGE: Inline suppression comments (guidelint-disable and friends)
// FORMAT THEOREM: suppressed(v) ↔ lineDirective(line(v), rule(v)) ∨ lastRangeDirectiveBefore(v, rule(v)) = disable
// PURITY: CORE
// INVARIANT: Directives are read from comments only; string contents never match
// COMPLEXITY: O(c + d) per violation where c = |comments|, d = |directives|

import { match } from "ts-pattern";

import type { Comment, Position, Violation } from "../types/index.js";

export type DirectiveRules = "all" | ReadonlySet<string>;

export interface RangeDirective extends Position {
	readonly kind: "disable" | "enable";
	readonly rules: DirectiveRules;
}

export interface LineDirective {
	readonly line: number;
	readonly rules: DirectiveRules;
}

export interface DirectiveIndex {
	readonly ranges: ReadonlyArray<RangeDirective>;
	readonly lines: ReadonlyArray<LineDirective>;
}

const DIRECTIVE_PATTERN =
	/^\s*guidelint-(disable-next-line|disable-line|disable|enable)(?=\s|$)([\s\S]*)$/u;

/**
 * Rule list after the directive name; text after `--` is a free-form reason.
 *
 * @example
 * ```ts
 * parseRuleList(" semicolon, eqeqeq -- legacy code"); // Set { "semicolon", "eqeqeq" }
 * parseRuleList("");                                   // "all"
 * ```
 */
export function parseRuleList(text: string): DirectiveRules {
	const withoutReason = text.split(/\s--\s|\s--$/u)[0] ?? "";
	const ids = withoutReason.split(/[\s,]+/u).filter((id) => id.length > 0);
	return ids.length === 0 ? "all" : new Set(ids);
}

function appliesTo(rules: DirectiveRules, ruleId: string): boolean {
	return rules === "all" || rules.has(ruleId);
}

/**
 * Extracts every directive from the file's comments.
 *
 * @pure true
 * @invariant ranges preserve comment order
 */
export function parseDirectives(
	comments: ReadonlyArray<Comment>,
): DirectiveIndex {
	const ranges: RangeDirective[] = [];
	const lines: LineDirective[] = [];
	for (const comment of comments) {
		const found = DIRECTIVE_PATTERN.exec(comment.value);
		if (found === null) continue;
		const rules = parseRuleList(found[2] ?? "");
		match(found[1])
			.with("disable", "enable", (kind) => {
				ranges.push({ kind, rules, line: comment.line, column: comment.column });
			})
			.with("disable-line", () => {
				lines.push({ line: comment.line, rules });
			})
			.with("disable-next-line", () => {
				lines.push({ line: comment.endLine + 1, rules });
			})
			.otherwise(() => undefined);
	}
	return { ranges, lines };
}

function isBefore(directive: Position, violation: Position): boolean {
	return (
		directive.line < violation.line ||
		(directive.line === violation.line && directive.column <= violation.column)
	);
}

/**
 * Whether the directives in effect at the violation's position silence it.
 *
 * Among range directives before the violation, the last one naming its rule
 * (or naming no rule) decides.
 */
export function isSuppressed(
	index: DirectiveIndex,
	violation: Pick<Violation, "ruleId" | "line" | "column">,
): boolean {
	const { ruleId } = violation;
	if (
		index.lines.some(
			(directive) =>
				directive.line === violation.line && appliesTo(directive.rules, ruleId),
		)
	) {
		return true;
	}

	let disabled = false;
	for (const directive of index.ranges) {
		if (!isBefore(directive, violation)) break;
		if (appliesTo(directive.rules, ruleId)) {
			disabled = directive.kind === "disable";
		}
	}
	return disabled;
}
