// CHANGE: Identifier naming rule (classes, functions, variables, parameters)
// FORMAT THEOREM: ∀ declared name n: case(strip(n)) ∈ allowedCases(kind(n)) ∨ n ∈ ignore
// PURITY: CORE
// INVARIANT: Only declaration sites are checked; references are never reported
// COMPLEXITY: O(m) where m = |nodes|

import { Either, pipe } from "effect";
import { match } from "ts-pattern";
import ts from "typescript";

import { forEachNode } from "../scanner/index.js";
import type {
	NamingConventionOptions,
	Rule,
	RuleFinding,
	SyntacticModel,
} from "../types/index.js";
import { findingForNode } from "./findings.js";
import {
	booleanOption,
	readOption,
	rejectUnknownKeys,
	stringArrayOption,
} from "./options.js";

const DEFAULT_OPTIONS: NamingConventionOptions = {
	allowLeadingUnderscore: false,
	allowUpperCaseConstants: true,
	ignore: [],
};

export type NameCase = "camelCase" | "PascalCase" | "UPPER_CASE";

type DeclarationKind = "class" | "function" | "variable" | "parameter";

const CASE_PATTERNS: Record<NameCase, RegExp> = {
	camelCase: /^[a-z][a-zA-Z0-9]*$/u,
	PascalCase: /^[A-Z][a-zA-Z0-9]*$/u,
	UPPER_CASE: /^[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)*$/u,
};

/**
 * Removes the prefixes the guide tolerates: `$` always, `_` on request.
 *
 * @pure true
 */
export function stripAllowedPrefix(
	name: string,
	allowLeadingUnderscore: boolean,
): string {
	const withoutDollar = name.replace(/^\$+/u, "");
	return allowLeadingUnderscore
		? withoutDollar.replace(/^_+/u, "")
		: withoutDollar;
}

export function matchesCase(name: string, nameCase: NameCase): boolean {
	return CASE_PATTERNS[nameCase].test(name);
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

function isConstDeclaration(declaration: ts.VariableDeclaration): boolean {
	const list = declaration.parent;
	return (
		ts.isVariableDeclarationList(list) &&
		(list.flags & ts.NodeFlags.Const) !== 0
	);
}

function unwrapParentheses(expression: ts.Expression): ts.Expression {
	return ts.isParenthesizedExpression(expression)
		? unwrapParentheses(expression.expression)
		: expression;
}

/**
 * `const Foo = class {}`, `const Foo = function () {}`, `const Foo = require("foo")`
 */
function isConstructorLikeInitializer(
	initializer: ts.Expression | undefined,
): boolean {
	if (initializer === undefined) return false;
	const expression = unwrapParentheses(initializer);
	return (
		ts.isClassExpression(expression) ||
		ts.isFunctionExpression(expression) ||
		(ts.isCallExpression(expression) &&
			ts.isIdentifier(expression.expression) &&
			expression.expression.text === "require")
	);
}

function variableCases(
	declaration: ts.VariableDeclaration,
	options: NamingConventionOptions,
): NameCase[] {
	const cases: NameCase[] = ["camelCase"];
	if (options.allowUpperCaseConstants && isConstDeclaration(declaration)) {
		cases.push("UPPER_CASE");
	}
	if (
		ts.isIdentifier(declaration.name) &&
		isConstructorLikeInitializer(declaration.initializer)
	) {
		cases.push("PascalCase");
	}
	return cases;
}

function describeKind(kind: DeclarationKind): string {
	return match(kind)
		.with("class", () => "Class")
		.with("function", () => "Function")
		.with("variable", () => "Variable")
		.with("parameter", () => "Parameter")
		.exhaustive();
}

function checkName(
	model: SyntacticModel,
	identifier: ts.Identifier,
	kind: DeclarationKind,
	cases: ReadonlyArray<NameCase>,
	options: NamingConventionOptions,
): RuleFinding | null {
	const name = identifier.text;
	if (options.ignore.includes(name)) return null;
	const core = stripAllowedPrefix(name, options.allowLeadingUnderscore);
	if (core.length === 0) return null;
	if (cases.some((nameCase) => matchesCase(core, nameCase))) return null;
	return findingForNode(
		model,
		identifier,
		`${describeKind(kind)} name '${name}' should be ${cases.join(" or ")}.`,
	);
}

export const namingConventionRule: Rule<"naming-convention"> = {
	id: "naming-convention",
	description:
		"Enforce PascalCase classes, camelCase functions and variables, UPPER_CASE constants",
	message: "Identifier does not follow the naming convention.",
	defaultSeverity: "error",
	defaultOptions: DEFAULT_OPTIONS,
	parseOptions: (raw) =>
		pipe(
			rejectUnknownKeys(raw, [
				"allowLeadingUnderscore",
				"allowUpperCaseConstants",
				"ignore",
			]),
			Either.flatMap(() =>
				Either.all({
					allowLeadingUnderscore: readOption(
						raw,
						"allowLeadingUnderscore",
						booleanOption,
						DEFAULT_OPTIONS.allowLeadingUnderscore,
					),
					allowUpperCaseConstants: readOption(
						raw,
						"allowUpperCaseConstants",
						booleanOption,
						DEFAULT_OPTIONS.allowUpperCaseConstants,
					),
					ignore: readOption(
						raw,
						"ignore",
						stringArrayOption,
						DEFAULT_OPTIONS.ignore,
					),
				}),
			),
		),
	check: (model, options) => {
		const findings: RuleFinding[] = [];
		const report = (
			identifier: ts.Identifier,
			kind: DeclarationKind,
			cases: ReadonlyArray<NameCase>,
		): void => {
			const finding = checkName(model, identifier, kind, cases, options);
			if (finding !== null) findings.push(finding);
		};

		forEachNode(model.sourceFile, (node) => {
			if (
				(ts.isClassDeclaration(node) || ts.isClassExpression(node)) &&
				node.name !== undefined
			) {
				report(node.name, "class", ["PascalCase"]);
			} else if (
				(ts.isFunctionDeclaration(node) || ts.isFunctionExpression(node)) &&
				node.name !== undefined
			) {
				report(node.name, "function", ["camelCase", "PascalCase"]);
			} else if (ts.isVariableDeclaration(node)) {
				const cases = variableCases(node, options);
				for (const identifier of bindingIdentifiers(node.name)) {
					report(identifier, "variable", cases);
				}
			} else if (ts.isParameter(node)) {
				for (const identifier of bindingIdentifiers(node.name)) {
					// TypeScript `this` parameter annotations
					if (identifier.text === "this") continue;
					report(identifier, "parameter", ["camelCase"]);
				}
			}
		});
		return findings;
	},
};
