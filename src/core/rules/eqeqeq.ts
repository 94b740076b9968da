// CHANGE: Strict equality rule
// FORMAT THEOREM: ∀ binary e: op(e) ∈ {==, !=} ∧ ¬(allowNull ∧ null ∈ operands(e)) → finding(e.operator)
// PURITY: CORE
// COMPLEXITY: O(m) where m = |nodes|

import { Either, pipe } from "effect";
import ts from "typescript";

import { forEachNode } from "../scanner/index.js";
import type { EqeqeqOptions, Rule, RuleFinding } from "../types/index.js";
import { findingForNode } from "./findings.js";
import { booleanOption, readOption, rejectUnknownKeys } from "./options.js";

const DEFAULT_OPTIONS: EqeqeqOptions = { allowNull: true };

const LOOSE_OPERATORS: ReadonlyMap<ts.SyntaxKind, string> = new Map([
	[ts.SyntaxKind.EqualsEqualsToken, "=="],
	[ts.SyntaxKind.ExclamationEqualsToken, "!="],
]);

function isNullLiteral(node: ts.Expression): boolean {
	return node.kind === ts.SyntaxKind.NullKeyword;
}

export const eqeqeqRule: Rule<"eqeqeq"> = {
	id: "eqeqeq",
	description: "Require === and !== instead of == and !=",
	message: "Expected a strict equality operator.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["allowNull"]),
			Either.flatMap(() =>
				Either.all({
					allowNull: readOption(
						raw,
						"allowNull",
						booleanOption,
						DEFAULT_OPTIONS.allowNull,
					),
				}),
			),
		),
	check: (model, options) => {
		const findings: RuleFinding[] = [];
		forEachNode(model.sourceFile, (node) => {
			if (!ts.isBinaryExpression(node)) return;
			const loose = LOOSE_OPERATORS.get(node.operatorToken.kind);
			if (loose === undefined) return;
			if (
				options.allowNull &&
				(isNullLiteral(node.left) || isNullLiteral(node.right))
			) {
				return;
			}
			findings.push(
				findingForNode(
					model,
					node.operatorToken,
					`Expected '${loose}=' and instead saw '${loose}'.`,
				),
			);
		});
		return findings;
	},
};
