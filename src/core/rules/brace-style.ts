// CHANGE: Brace placement rule (one true brace style and Allman)
// FORMAT THEOREM: 1tbs → line("{") = line(prev(" {")) ∧ line("}") = line(else|catch|finally)
//                 allman → both relations negated
// PURITY: CORE
// INVARIANT: Only block bodies are checked; object literals and JSX are ignored
// COMPLEXITY: O(m) where m = |nodes|

import { Either, pipe } from "effect";
import ts from "typescript";

import {
	firstTokenIndexAtOrAfter,
	forEachNode,
	tokenAt,
	tokenBefore,
	tokenIndexEndingAt,
} from "../scanner/index.js";
import type {
	BraceStyleOptions,
	Rule,
	RuleFinding,
	SyntacticModel,
	Token,
} from "../types/index.js";
import { findingForSpan } from "./findings.js";
import {
	booleanOption,
	enumOption,
	readOption,
	rejectUnknownKeys,
} from "./options.js";

const DEFAULT_OPTIONS: BraceStyleOptions = {
	style: "1tbs",
	allowSingleLine: true,
};

export const BRACE_MESSAGES = {
	openNotOnSameLine:
		"Opening curly brace does not appear on the same line as controlling statement.",
	openOnSameLine:
		"Opening curly brace appears on the same line as controlling statement.",
	closeNotOnSameLine:
		"Closing curly brace does not appear on the same line as the subsequent block.",
	closeOnSameLine:
		"Closing curly brace appears on the same line as the subsequent block.",
} as const;

/**
 * Blocks whose opening brace belongs to a controlling statement or declaration.
 */
function isControlledBlock(block: ts.Block): boolean {
	const parent = block.parent;
	return !(
		ts.isBlock(parent) ||
		ts.isSourceFile(parent) ||
		ts.isCaseClause(parent) ||
		ts.isDefaultClause(parent) ||
		ts.isModuleBlock(parent) ||
		ts.isLabeledStatement(parent)
	);
}

interface BracePair {
	readonly open: Token;
	readonly closeLine: number;
}

function bracePair(
	model: SyntacticModel,
	openStart: number,
	closeEnd: number,
): BracePair | null {
	const open = tokenAt(model, openStart);
	if (open === undefined || open.syntaxKind !== ts.SyntaxKind.OpenBraceToken) {
		return null;
	}
	const closeIndex = tokenIndexEndingAt(model, closeEnd);
	const close = closeIndex === undefined ? undefined : model.tokens[closeIndex];
	if (
		close === undefined ||
		close.syntaxKind !== ts.SyntaxKind.CloseBraceToken
	) {
		return null;
	}
	return { open, closeLine: close.line };
}

function classOpenBrace(
	model: SyntacticModel,
	node: ts.ClassLikeDeclaration,
): number | undefined {
	const index = tokenIndexEndingAt(model, node.members.pos);
	return index === undefined ? undefined : model.tokens[index]?.start;
}

function isSingleLine(pair: BracePair): boolean {
	return pair.open.line === pair.closeLine;
}

export const braceStyleRule: Rule<"brace-style"> = {
	id: "brace-style",
	description: "Enforce consistent brace placement for blocks",
	message: "Unexpected brace placement.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["style", "allowSingleLine"]),
			Either.flatMap(() =>
				Either.all({
					style: readOption(
						raw,
						"style",
						enumOption(["1tbs", "allman"] as const),
						DEFAULT_OPTIONS.style,
					),
					allowSingleLine: readOption(
						raw,
						"allowSingleLine",
						booleanOption,
						DEFAULT_OPTIONS.allowSingleLine,
					),
				}),
			),
		),
	check: (model, options) => {
		const findings: RuleFinding[] = [];
		const sourceFile = model.sourceFile;

		const checkOpening = (openStart: number, closeEnd: number): void => {
			const pair = bracePair(model, openStart, closeEnd);
			if (pair === null) return;
			if (options.allowSingleLine && isSingleLine(pair)) return;
			const previous = tokenBefore(model, pair.open.start);
			if (previous === undefined) return;
			const sameLine = previous.endLine === pair.open.line;
			if (options.style === "1tbs" && !sameLine) {
				findings.push(
					findingForSpan(pair.open, BRACE_MESSAGES.openNotOnSameLine),
				);
			} else if (options.style === "allman" && sameLine) {
				findings.push(findingForSpan(pair.open, BRACE_MESSAGES.openOnSameLine));
			}
		};

		// `} else`, `} catch`, `} finally`
		const checkClosing = (block: ts.Block, keywordStart: number): void => {
			const keyword = tokenAt(model, keywordStart);
			const close = tokenBefore(model, keywordStart);
			if (
				keyword === undefined ||
				close === undefined ||
				close.syntaxKind !== ts.SyntaxKind.CloseBraceToken
			) {
				return;
			}
			const pair = bracePair(model, block.getStart(sourceFile), block.getEnd());
			if (pair !== null && options.allowSingleLine && isSingleLine(pair)) {
				return;
			}
			const sameLine = close.line === keyword.line;
			if (options.style === "1tbs" && !sameLine) {
				findings.push(findingForSpan(close, BRACE_MESSAGES.closeNotOnSameLine));
			} else if (options.style === "allman" && sameLine) {
				findings.push(findingForSpan(close, BRACE_MESSAGES.closeOnSameLine));
			}
		};

		forEachNode(sourceFile, (node) => {
			if (ts.isBlock(node) && isControlledBlock(node)) {
				checkOpening(node.getStart(sourceFile), node.getEnd());
			} else if (ts.isCaseBlock(node)) {
				checkOpening(node.getStart(sourceFile), node.getEnd());
			} else if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
				const openStart = classOpenBrace(model, node);
				if (openStart !== undefined) checkOpening(openStart, node.getEnd());
			}

			if (
				ts.isIfStatement(node) &&
				node.elseStatement !== undefined &&
				ts.isBlock(node.thenStatement)
			) {
				const elseToken =
					model.tokens[
						firstTokenIndexAtOrAfter(model, node.thenStatement.getEnd())
					];
				if (elseToken?.syntaxKind === ts.SyntaxKind.ElseKeyword) {
					checkClosing(node.thenStatement, elseToken.start);
				}
			}

			if (ts.isTryStatement(node)) {
				if (node.catchClause !== undefined) {
					checkClosing(node.tryBlock, node.catchClause.getStart(sourceFile));
				}
				if (node.finallyBlock !== undefined) {
					const finallyToken = tokenBefore(
						model,
						node.finallyBlock.getStart(sourceFile),
					);
					if (finallyToken?.syntaxKind === ts.SyntaxKind.FinallyKeyword) {
						checkClosing(
							node.catchClause?.block ?? node.tryBlock,
							finallyToken.start,
						);
					}
				}
			}
		});
		return findings;
	},
};
