// CHANGE: Syntactic model produced by the source scanner
// PURITY: CORE
// INVARIANT: A SyntacticModel describes exactly one input text; it is never mutated
// COMPLEXITY: O(1)

import type ts from "typescript";

/**
 * Coarse token classes the rules reason about.
 */
export type TokenKind =
	| "identifier"
	| "keyword"
	| "punctuator"
	| "string"
	| "template"
	| "number"
	| "regex"
	| "other";

/**
 * 1-based line/column pair.
 */
export interface Position {
	readonly line: number;
	readonly column: number;
}

/**
 * Half-open source span [start, end) with 1-based line/column bounds.
 */
export interface Span extends Position {
	readonly start: number;
	readonly end: number;
	readonly endLine: number;
	readonly endColumn: number;
}

/**
 * A leaf of the syntax tree.
 *
 * @invariant text === model.text.slice(start, end) ∧ start < end
 */
export interface Token extends Span {
	readonly kind: TokenKind;
	readonly syntaxKind: ts.SyntaxKind;
	readonly text: string;
	readonly node: ts.Node;
}

export interface Comment extends Span {
	readonly kind: "line" | "block";
	/** Comment text including its delimiters. */
	readonly text: string;
	/** Comment body without `//`, `/*` and `*\/`. */
	readonly value: string;
}

/**
 * Boundary of a statement whose grammar ends with an (optional) semicolon.
 *
 * @invariant lastToken.end === end
 */
export interface StatementBoundary extends Span {
	readonly syntaxKind: ts.SyntaxKind;
	readonly lastToken: Token;
	readonly terminated: boolean;
}

export interface SyntaxErrorInfo extends Position {
	readonly message: string;
}

/**
 * Read-only view of one source text, sufficient to evaluate every rule.
 *
 * @invariant tokens sorted by start, non-overlapping
 * @invariant comments sorted by start, disjoint from tokens
 * @invariant lines.length === lineStarts.length
 */
export interface SyntacticModel {
	readonly filePath: string;
	readonly text: string;
	readonly lines: ReadonlyArray<string>;
	readonly lineStarts: ReadonlyArray<number>;
	readonly tokens: ReadonlyArray<Token>;
	readonly comments: ReadonlyArray<Comment>;
	readonly statements: ReadonlyArray<StatementBoundary>;
	readonly sourceFile: ts.SourceFile;
	readonly syntaxErrors: ReadonlyArray<SyntaxErrorInfo>;
	/** True when the file uses `import`/`export` syntax. */
	readonly isModuleSyntax: boolean;
	readonly tokenIndexByStart: ReadonlyMap<number, number>;
	readonly tokenIndexByEnd: ReadonlyMap<number, number>;
}
