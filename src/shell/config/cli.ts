// CHANGE: Command line parsing for the guidelint binary
// PURITY: SHELL (reads process.argv)
// INVARIANT: Never exits the process; failures are Either.left(UsageError)
// COMPLEXITY: O(a) where a = |argv|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIOptions, ReportFormat } from "../../core/types/index.js";

type ArgState = CLIOptions;

type ValueFlagHandler = (
	value: string,
	current: ArgState,
) => Either.Either<ArgState, UsageError>;

type SwitchFlagHandler = (current: ArgState) => ArgState;

const REPORT_FORMATS: ReadonlyArray<ReportFormat> = ["stylish", "json", "sarif"];

export const USAGE = `Usage: guidelint [paths...] [options]

Options:
  -f, --format <stylish|json|sarif>  Report format (default: stylish)
  -c, --config <path>                Configuration file (default: guidelint.config.json)
  -o, --output <path>                Write the report to a file instead of stdout
      --max-warnings <n>             Fail when more than n warnings are reported
  -q, --quiet                        Report errors only
      --list-rules                   Print the available rules and exit`;

function isReportFormat(value: string): value is ReportFormat {
	return REPORT_FORMATS.some((format) => format === value);
}

const usageError = (detail: string): UsageError => new UsageError({ detail });

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--format": (value, current) =>
		isReportFormat(value)
			? Either.right({ ...current, format: value })
			: Either.left(
					usageError(
						`unknown format "${value}" (expected stylish, json or sarif)`,
					),
				),
	"--config": (value, current) => Either.right({ ...current, configPath: value }),
	"--output": (value, current) => Either.right({ ...current, outputPath: value }),
	"--max-warnings": (value, current) => {
		const parsed = Number(value);
		return /^\d+$/u.test(value) && Number.isSafeInteger(parsed)
			? Either.right({ ...current, maxWarnings: parsed })
			: Either.left(
					usageError(
						`--max-warnings expects a non-negative integer, got "${value}"`,
					),
				);
	},
};

const switchHandlers: Readonly<Record<string, SwitchFlagHandler | undefined>> =
	{
		"--quiet": (current) => ({ ...current, quiet: true }),
		"--list-rules": (current) => ({ ...current, listRules: true }),
	};

const SHORT_FLAGS: Readonly<Record<string, string | undefined>> = {
	"-f": "--format",
	"-c": "--config",
	"-o": "--output",
	"-q": "--quiet",
};

/**
 * Splits `--flag=value` into flag and inline value.
 */
function splitInlineValue(arg: string): {
	readonly flag: string;
	readonly inline: string | undefined;
} {
	const separator = arg.indexOf("=");
	if (!arg.startsWith("--") || separator === -1) {
		return { flag: SHORT_FLAGS[arg] ?? arg, inline: undefined };
	}
	return { flag: arg.slice(0, separator), inline: arg.slice(separator + 1) };
}

/**
 * Parses an explicit argument list (without node and script path).
 *
 * @pure true
 * @invariant Either.isRight(result) → result.targetPaths.length ≥ 1
 */
export function parseArgs(
	args: ReadonlyArray<string>,
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = {
		targetPaths: [],
		format: "stylish",
		quiet: false,
		listRules: false,
	};

	for (let index = 0; index < args.length; index += 1) {
		const arg = args[index] ?? "";
		if (arg.length === 0) continue;

		if (!arg.startsWith("-") || arg === "-") {
			state = { ...state, targetPaths: [...state.targetPaths, arg] };
			continue;
		}

		const { flag, inline } = splitInlineValue(arg);
		const toggle = switchHandlers[flag];
		if (toggle !== undefined) {
			if (inline !== undefined) {
				return Either.left(usageError(`${flag} does not take a value`));
			}
			state = toggle(state);
			continue;
		}

		const handler = valueHandlers[flag];
		if (handler === undefined) {
			return Either.left(usageError(`unknown option "${arg}"`));
		}
		const value = inline ?? args[index + 1];
		if (value === undefined) {
			return Either.left(usageError(`missing value for ${flag}`));
		}
		if (inline === undefined) index += 1;
		const next = handler(value, state);
		if (Either.isLeft(next)) return Either.left(next.left);
		state = next.right;
	}

	return Either.right(
		state.targetPaths.length === 0 ? { ...state, targetPaths: ["."] } : state,
	);
}

/**
 * Парсит аргументы командной строки.
 *
 * @returns Опции командной строки или UsageError
 *
 * @example
 * ```ts
 * // Command: guidelint src --format json --max-warnings 0
 * const options = parseCLIArgs();
 * // Either.right({ targetPaths: ["src"], format: "json", maxWarnings: 0, quiet: false, listRules: false })
 * ```
 */
export function parseCLIArgs(): Either.Either<CLIOptions, UsageError> {
	return parseArgs(process.argv.slice(2));
}
