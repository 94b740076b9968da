// CHANGE: Application layer composing config, collection, evaluation and reporting
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every AppError becomes one stderr line and exit code 2
// COMPLEXITY: O(Σ |file|) over collected files

import { Effect } from "effect";
import { match } from "ts-pattern";

import { computeExitCode } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { InvariantViolation } from "../core/errors.js";
import { lintText } from "../core/evaluate/index.js";
import {
	dropWarnings,
	formatRuleList,
	formatSummary,
	summarize,
} from "../core/format/index.js";
import type { ExitCode } from "../core/models.js";
import type {
	CLIOptions,
	FileReport,
	LinterConfig,
} from "../core/types/index.js";
import { loadLinterConfig } from "../shell/config/index.js";
import {
	collectTargetFiles,
	readTargetFile,
	type TargetFile,
} from "../shell/files/collector.js";
import { writeReport } from "../shell/output/printer.js";
import { debugLog, errorMessage } from "../shell/utils/debug.js";

/** Files read and evaluated at the same time. */
export const FILE_CONCURRENCY = 8;

/**
 * One-line description of an application error.
 *
 * @pure true
 */
export function describeAppError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "ConfigError" },
			(e) => `Invalid configuration (${e.path}): ${e.detail}`,
		)
		.with({ _tag: "UsageError" }, (e) => `Usage error: ${e.detail}`)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined
				? `File system error: ${e.detail}`
				: `File system error (${e.path}): ${e.detail}`,
		)
		.with(
			{ _tag: "InvariantViolation" },
			(e) => `Internal error in ${e.where}: ${e.detail}`,
		)
		.exhaustive();
}

/**
 * Reads and lints one file; a throwing rule becomes an InvariantViolation.
 */
export function lintFileEffect(
	file: TargetFile,
	config: LinterConfig,
): Effect.Effect<FileReport, AppError> {
	return Effect.gen(function* (_) {
		const text = yield* _(readTargetFile(file));
		const report = yield* _(
			Effect.try({
				try: () => lintText(text, file.displayPath, config),
				catch: (error) =>
					new InvariantViolation({
						where: file.displayPath,
						detail: errorMessage(error),
					}),
			}),
		);
		debugLog(
			`${file.displayPath}: ${report.errorCount} error(s), ${report.warningCount} warning(s)`,
		);
		return report;
	});
}

/**
 * Full run without error recovery.
 *
 * @invariant Success value ∈ {0, 1}
 */
export function runLinterProgram(
	cliOptions: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* (_) {
		if (cliOptions.listRules) {
			console.log(formatRuleList());
			return computeExitCode({ errorCount: 0, warningCount: 0 });
		}

		const config = yield* _(loadLinterConfig(cliOptions.configPath, cwd));
		const files = yield* _(
			collectTargetFiles(cliOptions.targetPaths, config, cwd),
		);
		const reports = yield* _(
			Effect.forEach(files, (file) => lintFileEffect(file, config), {
				concurrency: FILE_CONCURRENCY,
			}),
		);

		const summary = summarize(reports);
		const visible = cliOptions.quiet ? dropWarnings(summary) : summary;
		yield* _(
			writeReport(
				formatSummary(visible, cliOptions.format),
				cliOptions.outputPath,
				cwd,
			),
		);

		return computeExitCode({
			errorCount: summary.errorCount,
			warningCount: summary.warningCount,
			...(cliOptions.maxWarnings === undefined
				? {}
				: { maxWarnings: cliOptions.maxWarnings }),
		});
	});
}

/**
 * Runs the linter and converts every failure into exit code 2.
 *
 * @param cliOptions Разобранные опции командной строки
 * @param cwd Рабочая директория
 * @returns Effect, который никогда не падает
 */
export function runLinter(
	cliOptions: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	return runLinterProgram(cliOptions, cwd).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ ${describeAppError(error)}`);
				return 2;
			}),
		),
	);
}
