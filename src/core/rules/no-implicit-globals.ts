// CHANGE: Global variable detection
// FORMAT THEOREM: ∀ assignment target x: declared(x, scopes(x)) ∨ x ∈ allow;
//                 script(file) → ∀ top-level declaration d: name(d) ∈ allow
// PURITY: CORE
// INVARIANT: Scopes are syntactic (function and block); no type information is used
// COMPLEXITY: O(m · d) where m = |nodes|, d = scope depth

import { Either, pipe } from "effect";
import ts from "typescript";

import { extensionOf, forEachNode } from "../scanner/index.js";
import type {
	NoImplicitGlobalsOptions,
	Rule,
	RuleFinding,
	SyntacticModel,
} from "../types/index.js";
import { findingForNode } from "./findings.js";
import {
	enumOption,
	readOption,
	rejectUnknownKeys,
	stringArrayOption,
} from "./options.js";

const DEFAULT_OPTIONS: NoImplicitGlobalsOptions = {
	allow: [],
	sourceType: "auto",
};

const MODULE_EXTENSIONS: ReadonlySet<string> = new Set([".mjs", ".cjs"]);

type ScopeMap = Map<ts.Node, Set<string>>;

function isFunctionScope(node: ts.Node): boolean {
	return (
		ts.isSourceFile(node) ||
		ts.isFunctionDeclaration(node) ||
		ts.isFunctionExpression(node) ||
		ts.isArrowFunction(node) ||
		ts.isMethodDeclaration(node) ||
		ts.isConstructorDeclaration(node) ||
		ts.isGetAccessorDeclaration(node) ||
		ts.isSetAccessorDeclaration(node) ||
		ts.isClassStaticBlockDeclaration(node)
	);
}

function isBlockScope(node: ts.Node): boolean {
	return (
		ts.isBlock(node) ||
		ts.isForStatement(node) ||
		ts.isForInStatement(node) ||
		ts.isForOfStatement(node) ||
		ts.isCaseBlock(node) ||
		ts.isCatchClause(node) ||
		ts.isModuleBlock(node)
	);
}

function bindingNames(name: ts.BindingName): string[] {
	if (ts.isIdentifier(name)) return [name.text];
	const names: string[] = [];
	for (const element of name.elements) {
		if (ts.isBindingElement(element)) names.push(...bindingNames(element.name));
	}
	return names;
}

function bindingIdentifiers(name: ts.BindingName): ts.Identifier[] {
	if (ts.isIdentifier(name)) return [name];
	const identifiers: ts.Identifier[] = [];
	for (const element of name.elements) {
		if (ts.isBindingElement(element)) {
			identifiers.push(...bindingIdentifiers(element.name));
		}
	}
	return identifiers;
}

/**
 * Records every declared name against the scope node that owns it.
 *
 * INVARIANT: `var` and parameters bind to the nearest function scope,
 * `let`/`const`/`class` to the nearest block scope; function declarations to both.
 */
function collectDeclarations(sourceFile: ts.SourceFile): ScopeMap {
	const scopes: ScopeMap = new Map();
	const declare = (scope: ts.Node, names: ReadonlyArray<string>): void => {
		const existing = scopes.get(scope) ?? new Set<string>();
		for (const name of names) existing.add(name);
		scopes.set(scope, existing);
	};

	const visit = (
		node: ts.Node,
		functionScope: ts.Node,
		blockScope: ts.Node,
	): void => {
		if (ts.isVariableDeclaration(node)) {
			const list = node.parent;
			const blockScoped =
				!ts.isVariableDeclarationList(list) ||
				(list.flags & ts.NodeFlags.BlockScoped) !== 0;
			declare(blockScoped ? blockScope : functionScope, bindingNames(node.name));
		} else if (ts.isParameter(node)) {
			declare(functionScope, bindingNames(node.name));
		} else if (ts.isFunctionDeclaration(node) && node.name !== undefined) {
			declare(blockScope, [node.name.text]);
			declare(functionScope, [node.name.text]);
		} else if (
			(ts.isClassDeclaration(node) ||
				ts.isEnumDeclaration(node) ||
				ts.isModuleDeclaration(node)) &&
			node.name !== undefined &&
			ts.isIdentifier(node.name)
		) {
			declare(blockScope, [node.name.text]);
		} else if (
			(ts.isFunctionExpression(node) || ts.isClassExpression(node)) &&
			node.name !== undefined
		) {
			declare(node, [node.name.text]);
		} else if (
			(ts.isImportClause(node) ||
				ts.isNamespaceImport(node) ||
				ts.isImportSpecifier(node) ||
				ts.isImportEqualsDeclaration(node)) &&
			node.name !== undefined
		) {
			declare(sourceFile, [node.name.text]);
		}

		const nextFunctionScope = isFunctionScope(node) ? node : functionScope;
		const nextBlockScope =
			isFunctionScope(node) || isBlockScope(node) ? node : blockScope;
		ts.forEachChild(node, (child) =>
			visit(child, nextFunctionScope, nextBlockScope),
		);
	};

	visit(sourceFile, sourceFile, sourceFile);
	return scopes;
}

function isDeclared(scopes: ScopeMap, identifier: ts.Identifier): boolean {
	const name = identifier.text;
	let current: ts.Node | undefined = identifier.parent;
	while (current !== undefined) {
		if (scopes.get(current)?.has(name) === true) return true;
		current = current.parent;
	}
	return false;
}

function unwrapParentheses(expression: ts.Expression): ts.Expression {
	return ts.isParenthesizedExpression(expression)
		? unwrapParentheses(expression.expression)
		: expression;
}

function isAssignmentOperator(kind: ts.SyntaxKind): boolean {
	return (
		kind >= ts.SyntaxKind.FirstAssignment && kind <= ts.SyntaxKind.LastAssignment
	);
}

/**
 * Identifiers written by an assignment target, including destructuring patterns.
 */
function assignmentTargets(target: ts.Expression): ts.Identifier[] {
	const expression = unwrapParentheses(target);
	if (ts.isIdentifier(expression)) return [expression];
	if (
		ts.isBinaryExpression(expression) &&
		expression.operatorToken.kind === ts.SyntaxKind.EqualsToken
	) {
		// Default value inside a pattern: `[a = 1] = list`
		return assignmentTargets(expression.left);
	}
	if (ts.isSpreadElement(expression)) {
		return assignmentTargets(expression.expression);
	}
	if (ts.isArrayLiteralExpression(expression)) {
		return expression.elements.flatMap((element) =>
			assignmentTargets(element),
		);
	}
	if (ts.isObjectLiteralExpression(expression)) {
		return expression.properties.flatMap((property) => {
			if (ts.isShorthandPropertyAssignment(property)) return [property.name];
			if (ts.isPropertyAssignment(property)) {
				return assignmentTargets(property.initializer);
			}
			if (ts.isSpreadAssignment(property)) {
				return assignmentTargets(property.expression);
			}
			return [];
		});
	}
	return [];
}

function writtenIdentifiers(node: ts.Node): ts.Identifier[] {
	if (
		ts.isBinaryExpression(node) &&
		isAssignmentOperator(node.operatorToken.kind)
	) {
		return assignmentTargets(node.left);
	}
	if (
		(ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) &&
		(node.operator === ts.SyntaxKind.PlusPlusToken ||
			node.operator === ts.SyntaxKind.MinusMinusToken)
	) {
		const operand = unwrapParentheses(node.operand);
		return ts.isIdentifier(operand) ? [operand] : [];
	}
	if (
		(ts.isForInStatement(node) || ts.isForOfStatement(node)) &&
		!ts.isVariableDeclarationList(node.initializer)
	) {
		return assignmentTargets(node.initializer);
	}
	return [];
}

/**
 * Decides whether the file's top level is the global scope.
 *
 * @pure true
 */
export function isScriptSource(
	model: SyntacticModel,
	sourceType: NoImplicitGlobalsOptions["sourceType"],
): boolean {
	if (sourceType !== "auto") return sourceType === "script";
	return (
		!model.isModuleSyntax && !MODULE_EXTENSIONS.has(extensionOf(model.filePath))
	);
}

function topLevelDeclarations(sourceFile: ts.SourceFile): ts.Identifier[] {
	const identifiers: ts.Identifier[] = [];
	for (const statement of sourceFile.statements) {
		if (ts.isVariableStatement(statement)) {
			for (const declaration of statement.declarationList.declarations) {
				identifiers.push(...bindingIdentifiers(declaration.name));
			}
		} else if (
			(ts.isFunctionDeclaration(statement) ||
				ts.isClassDeclaration(statement)) &&
			statement.name !== undefined
		) {
			identifiers.push(statement.name);
		}
	}
	return identifiers;
}

export const noImplicitGlobalsRule: Rule<"no-implicit-globals"> = {
	id: "no-implicit-globals",
	description:
		"Disallow implicit globals and declarations in the global scope of scripts",
	message: "Unexpected global variable.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, ["allow", "sourceType"]),
			Either.flatMap(() =>
				Either.all({
					allow: readOption(
						raw,
						"allow",
						stringArrayOption,
						DEFAULT_OPTIONS.allow,
					),
					sourceType: readOption(
						raw,
						"sourceType",
						enumOption(["auto", "script", "module"] as const),
						DEFAULT_OPTIONS.sourceType,
					),
				}),
			),
		),
	check: (model, options) => {
		const findings: RuleFinding[] = [];
		const allowed = new Set(options.allow);
		const scopes = collectDeclarations(model.sourceFile);

		forEachNode(model.sourceFile, (node) => {
			for (const identifier of writtenIdentifiers(node)) {
				if (allowed.has(identifier.text) || isDeclared(scopes, identifier)) {
					continue;
				}
				findings.push(
					findingForNode(
						model,
						identifier,
						`Assignment to undeclared variable '${identifier.text}' creates an implicit global.`,
					),
				);
			}
		});

		if (isScriptSource(model, options.sourceType)) {
			for (const identifier of topLevelDeclarations(model.sourceFile)) {
				if (allowed.has(identifier.text)) continue;
				findings.push(
					findingForNode(
						model,
						identifier,
						`'${identifier.text}' is declared in the global scope.`,
					),
				);
			}
		}
		return findings.sort((a, b) => a.line - b.line || a.column - b.column);
	},
};
