// CHANGE: Source scanner built on the TypeScript parser (no hand-written lexer)
// FORMAT THEOREM: ∀text: scanSource(text).tokens = leaves(parse(text)) ∧ ∀t: text.slice(t.start, t.end) = t.text
// PURITY: CORE
// INVARIANT: The model corresponds 1:1 to the exact input text; no IO
// COMPLEXITY: O(n) where n = |text|

import ts from "typescript";

import type {
	Comment,
	StatementBoundary,
	SyntacticModel,
	SyntaxErrorInfo,
	Token,
	TokenKind,
} from "../types/index.js";

/**
 * Parser configuration per file extension: script kind plus the canonical
 * extension handed to the TypeScript parser.
 */
const SCRIPT_KIND_BY_EXTENSION: Record<
	string,
	{ readonly kind: ts.ScriptKind; readonly canonical: string }
> = {
	".js": { kind: ts.ScriptKind.JS, canonical: ".js" },
	".mjs": { kind: ts.ScriptKind.JS, canonical: ".js" },
	".cjs": { kind: ts.ScriptKind.JS, canonical: ".js" },
	".jsx": { kind: ts.ScriptKind.JSX, canonical: ".jsx" },
	".ts": { kind: ts.ScriptKind.TS, canonical: ".ts" },
	".mts": { kind: ts.ScriptKind.TS, canonical: ".ts" },
	".cts": { kind: ts.ScriptKind.TS, canonical: ".ts" },
	".tsx": { kind: ts.ScriptKind.TSX, canonical: ".tsx" },
};

const DEFAULT_SCRIPT = { kind: ts.ScriptKind.JS, canonical: ".js" } as const;

/**
 * Statements whose grammar ends with an optional semicolon.
 */
const TERMINABLE_STATEMENTS: ReadonlySet<ts.SyntaxKind> = new Set([
	ts.SyntaxKind.VariableStatement,
	ts.SyntaxKind.ExpressionStatement,
	ts.SyntaxKind.ReturnStatement,
	ts.SyntaxKind.ThrowStatement,
	ts.SyntaxKind.BreakStatement,
	ts.SyntaxKind.ContinueStatement,
	ts.SyntaxKind.DoStatement,
	ts.SyntaxKind.DebuggerStatement,
	ts.SyntaxKind.ImportDeclaration,
	ts.SyntaxKind.ImportEqualsDeclaration,
	ts.SyntaxKind.ExportDeclaration,
	ts.SyntaxKind.ExportAssignment,
	ts.SyntaxKind.PropertyDeclaration,
]);

const LINE_TERMINATOR_SUFFIX = /(?:\r\n|\r|\n|\u2028|\u2029)$/u;

export function extensionOf(filePath: string): string {
	const match = /\.[^./\\]+$/u.exec(filePath);
	return match === null ? "" : match[0].toLowerCase();
}

function resolveScript(filePath: string): {
	readonly kind: ts.ScriptKind;
	readonly canonical: string;
} {
	return SCRIPT_KIND_BY_EXTENSION[extensionOf(filePath)] ?? DEFAULT_SCRIPT;
}

function isJSDocKind(kind: ts.SyntaxKind): boolean {
	return (
		kind >= ts.SyntaxKind.FirstJSDocNode && kind <= ts.SyntaxKind.LastJSDocNode
	);
}

/**
 * Maps a parser token kind to the coarse class rules reason about.
 *
 * @pure true
 * @complexity O(1)
 */
export function classifyToken(kind: ts.SyntaxKind): TokenKind {
	if (
		kind === ts.SyntaxKind.Identifier ||
		kind === ts.SyntaxKind.PrivateIdentifier
	) {
		return "identifier";
	}
	if (kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword) {
		return "keyword";
	}
	if (
		kind >= ts.SyntaxKind.FirstPunctuation &&
		kind <= ts.SyntaxKind.LastPunctuation
	) {
		return "punctuator";
	}
	switch (kind) {
		case ts.SyntaxKind.StringLiteral:
			return "string";
		case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
		case ts.SyntaxKind.TemplateHead:
		case ts.SyntaxKind.TemplateMiddle:
		case ts.SyntaxKind.TemplateTail:
			return "template";
		case ts.SyntaxKind.NumericLiteral:
		case ts.SyntaxKind.BigIntLiteral:
			return "number";
		case ts.SyntaxKind.RegularExpressionLiteral:
			return "regex";
		default:
			return "other";
	}
}

/**
 * Collects the leaves of the syntax tree in source order.
 *
 * INVARIANT: JSDoc nodes are skipped; their text is reported as comments
 * COMPLEXITY: O(m) where m = |nodes|
 */
function collectLeaves(
	node: ts.Node,
	sourceFile: ts.SourceFile,
	out: ts.Node[],
): void {
	if (isJSDocKind(node.kind)) return;
	const children = node.getChildren(sourceFile);
	if (children.length === 0) {
		if (
			node.kind !== ts.SyntaxKind.SyntaxList &&
			node.kind !== ts.SyntaxKind.EndOfFileToken
		) {
			out.push(node);
		}
		return;
	}
	for (const child of children) {
		collectLeaves(child, sourceFile, out);
	}
}

function spanOf(
	sourceFile: ts.SourceFile,
	start: number,
	end: number,
): {
	readonly start: number;
	readonly end: number;
	readonly line: number;
	readonly column: number;
	readonly endLine: number;
	readonly endColumn: number;
} {
	const from = sourceFile.getLineAndCharacterOfPosition(start);
	const to = sourceFile.getLineAndCharacterOfPosition(end);
	return {
		start,
		end,
		line: from.line + 1,
		column: from.character + 1,
		endLine: to.line + 1,
		endColumn: to.character + 1,
	};
}

function toToken(node: ts.Node, sourceFile: ts.SourceFile): Token | null {
	const start = node.getStart(sourceFile);
	const end = node.getEnd();
	// Parser recovery inserts zero-width "missing" nodes
	if (start >= end) return null;
	return {
		...spanOf(sourceFile, start, end),
		kind: classifyToken(node.kind),
		syntaxKind: node.kind,
		text: sourceFile.text.slice(start, end),
		node,
	};
}

/**
 * Every comment of the file: leading and trailing trivia of each leaf, deduplicated.
 *
 * INVARIANT: result sorted by start
 */
function collectComments(
	leaves: ReadonlyArray<ts.Node>,
	sourceFile: ts.SourceFile,
): Comment[] {
	const text = sourceFile.text;
	const byStart = new Map<number, ts.CommentRange>();
	const fullStarts = [
		// JSX text is element content; `//` inside it is not a comment
		...leaves
			.filter((leaf) => leaf.kind !== ts.SyntaxKind.JsxText)
			.map((leaf) => leaf.getFullStart()),
		sourceFile.endOfFileToken.getFullStart(),
	];
	for (const fullStart of fullStarts) {
		const ranges = [
			...(ts.getLeadingCommentRanges(text, fullStart) ?? []),
			...(ts.getTrailingCommentRanges(text, fullStart) ?? []),
		];
		for (const range of ranges) {
			byStart.set(range.pos, range);
		}
	}
	return [...byStart.values()]
		.sort((a, b) => a.pos - b.pos)
		.map((range) => {
			const isLine = range.kind === ts.SyntaxKind.SingleLineCommentTrivia;
			const commentText = text.slice(range.pos, range.end);
			return {
				...spanOf(sourceFile, range.pos, range.end),
				kind: isLine ? "line" : "block",
				text: commentText,
				value: isLine ? commentText.slice(2) : commentText.slice(2, -2),
			};
		});
}

function collectStatements(
	sourceFile: ts.SourceFile,
	tokens: ReadonlyArray<Token>,
	tokenIndexByEnd: ReadonlyMap<number, number>,
): StatementBoundary[] {
	const statements: StatementBoundary[] = [];
	const visit = (node: ts.Node): void => {
		if (TERMINABLE_STATEMENTS.has(node.kind)) {
			const index = tokenIndexByEnd.get(node.getEnd());
			const lastToken = index === undefined ? undefined : tokens[index];
			if (lastToken !== undefined) {
				statements.push({
					...spanOf(sourceFile, node.getStart(sourceFile), node.getEnd()),
					syntaxKind: node.kind,
					lastToken,
					terminated: lastToken.syntaxKind === ts.SyntaxKind.SemicolonToken,
				});
			}
		}
		ts.forEachChild(node, visit);
	};
	visit(sourceFile);
	return statements.sort((a, b) => a.start - b.start);
}

/**
 * Syntactic diagnostics of the text, as reported by the TypeScript parser.
 *
 * INVARIANT: only error-category diagnostics attached to the file
 */
function collectSyntaxErrors(
	text: string,
	parseFileName: string,
	scriptKind: ts.ScriptKind,
): SyntaxErrorInfo[] {
	const result = ts.transpileModule(text, {
		fileName: parseFileName,
		reportDiagnostics: true,
		compilerOptions: {
			allowJs: true,
			jsx:
				scriptKind === ts.ScriptKind.JSX || scriptKind === ts.ScriptKind.TSX
					? ts.JsxEmit.Preserve
					: ts.JsxEmit.None,
		},
	});
	const errors: SyntaxErrorInfo[] = [];
	for (const diagnostic of result.diagnostics ?? []) {
		if (
			diagnostic.category !== ts.DiagnosticCategory.Error ||
			diagnostic.file === undefined ||
			diagnostic.start === undefined
		) {
			continue;
		}
		const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(
			diagnostic.start,
		);
		errors.push({
			message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
			line: line + 1,
			column: character + 1,
		});
	}
	return errors;
}

function splitLines(
	text: string,
	lineStarts: ReadonlyArray<number>,
): ReadonlyArray<string> {
	return lineStarts.map((start, index) =>
		text
			.slice(start, lineStarts[index + 1] ?? text.length)
			.replace(LINE_TERMINATOR_SUFFIX, ""),
	);
}

/**
 * Scans a source text into the syntactic model every rule is evaluated against.
 *
 * @param text - Exact file contents
 * @param filePath - Path used for reporting and to pick the script kind
 *
 * @pure true
 * @invariant ∀i: tokens[i].end ≤ tokens[i+1].start
 * @complexity O(n) where n = |text|
 *
 * @example
 * ```ts
 * const model = scanSource("var a = 1\n", "a.js");
 * model.tokens.map((t) => t.text); // ["var", "a", "=", "1"]
 * model.statements[0]?.terminated; // false
 * ```
 */
export function scanSource(text: string, filePath: string): SyntacticModel {
	const script = resolveScript(filePath);
	const parseFileName = `input${script.canonical}`;
	const sourceFile = ts.createSourceFile(
		parseFileName,
		text,
		ts.ScriptTarget.Latest,
		/* setParentNodes */ true,
		script.kind,
	);

	const leaves: ts.Node[] = [];
	collectLeaves(sourceFile, sourceFile, leaves);

	const tokens: Token[] = [];
	for (const leaf of leaves) {
		const token = toToken(leaf, sourceFile);
		if (token !== null) tokens.push(token);
	}

	const tokenIndexByStart = new Map<number, number>();
	const tokenIndexByEnd = new Map<number, number>();
	tokens.forEach((token, index) => {
		tokenIndexByStart.set(token.start, index);
		tokenIndexByEnd.set(token.end, index);
	});

	const lineStarts = sourceFile.getLineStarts();

	return {
		filePath,
		text,
		lines: splitLines(text, lineStarts),
		lineStarts,
		tokens,
		comments: collectComments(leaves, sourceFile),
		statements: collectStatements(sourceFile, tokens, tokenIndexByEnd),
		sourceFile,
		syntaxErrors: collectSyntaxErrors(text, parseFileName, script.kind),
		isModuleSyntax: ts.isExternalModule(sourceFile),
		tokenIndexByStart,
		tokenIndexByEnd,
	};
}
