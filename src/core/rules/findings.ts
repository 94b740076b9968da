// CHANGE: Builders for rule findings from tokens, nodes and offsets
// PURITY: CORE
// INVARIANT: Findings carry 1-based positions

import type ts from "typescript";

import { locationOf } from "../scanner/index.js";
import type { RuleFinding, Span, SyntacticModel } from "../types/index.js";

export function findingForSpan(span: Span, message?: string): RuleFinding {
	const base = {
		line: span.line,
		column: span.column,
		endLine: span.endLine,
		endColumn: span.endColumn,
	};
	return message === undefined ? base : { ...base, message };
}

export function findingForRange(
	model: SyntacticModel,
	start: number,
	end: number,
	message?: string,
): RuleFinding {
	const from = locationOf(model, start);
	const to = locationOf(model, end);
	const base = {
		line: from.line,
		column: from.column,
		endLine: to.line,
		endColumn: to.column,
	};
	return message === undefined ? base : { ...base, message };
}

export function findingForNode(
	model: SyntacticModel,
	node: ts.Node,
	message?: string,
): RuleFinding {
	return findingForRange(
		model,
		node.getStart(model.sourceFile),
		node.getEnd(),
		message,
	);
}
