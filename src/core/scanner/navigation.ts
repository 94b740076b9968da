// CHANGE: Pure lookups over a SyntacticModel shared by the rules
// PURITY: CORE
// INVARIANT: Lookups never mutate the model
// COMPLEXITY: O(log n) for positional search, O(1) for map lookups

import ts from "typescript";

import type { Position, SyntacticModel, Token } from "../types/index.js";

/**
 * 1-based position of an offset in the model's text.
 *
 * @pure true
 */
export function locationOf(model: SyntacticModel, offset: number): Position {
	const { line, character } =
		model.sourceFile.getLineAndCharacterOfPosition(offset);
	return { line: line + 1, column: character + 1 };
}

export function tokenIndexAt(
	model: SyntacticModel,
	start: number,
): number | undefined {
	return model.tokenIndexByStart.get(start);
}

export function tokenIndexEndingAt(
	model: SyntacticModel,
	end: number,
): number | undefined {
	return model.tokenIndexByEnd.get(end);
}

export function tokenAt(
	model: SyntacticModel,
	start: number,
): Token | undefined {
	const index = model.tokenIndexByStart.get(start);
	return index === undefined ? undefined : model.tokens[index];
}

/**
 * Index of the first token starting at or after `offset`; tokens.length when none.
 *
 * @pure true
 * @complexity O(log n) binary search over sorted tokens
 */
export function firstTokenIndexAtOrAfter(
	model: SyntacticModel,
	offset: number,
): number {
	let low = 0;
	let high = model.tokens.length;
	while (low < high) {
		const mid = (low + high) >>> 1;
		const token = model.tokens[mid];
		if (token !== undefined && token.start < offset) {
			low = mid + 1;
		} else {
			high = mid;
		}
	}
	return low;
}

/**
 * Token immediately preceding the token that starts at `start`.
 */
export function tokenBefore(
	model: SyntacticModel,
	start: number,
): Token | undefined {
	const index = model.tokenIndexByStart.get(start);
	return index === undefined || index === 0
		? undefined
		: model.tokens[index - 1];
}

/**
 * Depth-first pre-order walk over the syntax tree.
 *
 * @complexity O(m) where m = |nodes|
 */
export function forEachNode(
	root: ts.Node,
	visit: (node: ts.Node) => void,
): void {
	const walk = (node: ts.Node): void => {
		visit(node);
		ts.forEachChild(node, walk);
	};
	walk(root);
}
