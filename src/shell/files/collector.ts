// CHANGE: Resolution of CLI targets into the list of files to lint
// FORMAT THEOREM: collect(targets) = dedupe(⋃ t ∈ targets: isFile(t) ? {t} : walk(t) ∩ extensions)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<TargetFile>, FSError>
// INVARIANT: Directory entries are visited in sorted order; explicitly named files are always kept
// COMPLEXITY: O(n) where n = entries under the targets

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { extensionOf } from "../../core/scanner/index.js";
import type { LinterConfig } from "../../core/types/index.js";
import { debugLog, errorMessage } from "../utils/debug.js";
import { fsPromises, path } from "../utils/node-mods.js";

export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set([
	".git",
	"node_modules",
	"dist",
	"coverage",
	"build",
]);

/**
 * A file selected for linting.
 *
 * @property absolutePath Путь для чтения файла
 * @property displayPath Путь относительно рабочей директории, с "/" в качестве разделителя
 */
export interface TargetFile {
	readonly absolutePath: string;
	readonly displayPath: string;
}

function toDisplayPath(cwd: string, absolutePath: string): string {
	const relative = path.relative(cwd, absolutePath);
	const display = relative.length === 0 ? path.basename(absolutePath) : relative;
	return display.split(path.sep).join("/");
}

function fsError(detail: string, targetPath: string): (error: unknown) => FSError {
	return (error) =>
		new FSError({ detail: `${detail}: ${errorMessage(error)}`, path: targetPath });
}

function walkDirectory(
	absoluteDir: string,
	skipped: ReadonlySet<string>,
	extensions: ReadonlySet<string>,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* (_) {
		const dirents = yield* _(
			Effect.tryPromise({
				try: () => fsPromises.readdir(absoluteDir, { withFileTypes: true }),
				catch: fsError("cannot read directory", absoluteDir),
			}),
		);

		const files: string[] = [];
		const sorted = [...dirents].sort((a, b) =>
			a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
		);

		for (const dirent of sorted) {
			const absolutePath = path.join(absoluteDir, dirent.name);
			if (dirent.isDirectory()) {
				if (skipped.has(dirent.name)) {
					debugLog(`skip directory ${absolutePath}`);
					continue;
				}
				const nested = yield* _(walkDirectory(absolutePath, skipped, extensions));
				files.push(...nested);
				continue;
			}
			if (dirent.isFile() && extensions.has(extensionOf(dirent.name))) {
				files.push(absolutePath);
			}
		}
		return files;
	});
}

/**
 * Expands files and directories named on the command line.
 *
 * @param targetPaths - Paths as given by the user
 * @param config - Extensions and ignored directory names
 * @param cwd - Directory relative paths are resolved against
 *
 * @invariant result contains no duplicate absolutePath
 */
export function collectTargetFiles(
	targetPaths: ReadonlyArray<string>,
	config: Pick<LinterConfig, "extensions" | "ignore">,
	cwd: string = process.cwd(),
): Effect.Effect<readonly TargetFile[], FSError> {
	const skipped = new Set([...IGNORED_DIRECTORIES, ...config.ignore]);
	const extensions = new Set(config.extensions);

	return Effect.gen(function* (_) {
		const seen = new Set<string>();
		const files: TargetFile[] = [];

		for (const target of targetPaths) {
			const absoluteTarget = path.resolve(cwd, target);
			const stats = yield* _(
				Effect.tryPromise({
					try: () => fsPromises.stat(absoluteTarget),
					catch: fsError("cannot access target", target),
				}),
			);

			let found: readonly string[] = [absoluteTarget];
			if (stats.isDirectory()) {
				found = yield* _(walkDirectory(absoluteTarget, skipped, extensions));
			}

			for (const absolutePath of found) {
				if (seen.has(absolutePath)) continue;
				seen.add(absolutePath);
				files.push({
					absolutePath,
					displayPath: toDisplayPath(cwd, absolutePath),
				});
			}
		}

		debugLog(`collected ${files.length} file(s) from ${targetPaths.length} target(s)`);
		return files;
	});
}

/**
 * Reads a target file as UTF-8.
 */
export function readTargetFile(
	file: TargetFile,
): Effect.Effect<string, FSError> {
	return Effect.tryPromise({
		try: () => fsPromises.readFile(file.absolutePath, "utf8"),
		catch: fsError("cannot read file", file.displayPath),
	});
}
