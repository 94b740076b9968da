// CHANGE: Loading of guidelint.config.json under Effect discipline
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<LinterConfig, ConfigError>
// INVARIANT: Missing default file → built-in defaults; every other problem → ConfigError
// COMPLEXITY: O(n) where n = |file|

import { Effect, Either, pipe } from "effect";

import {
	defaultLinterConfig,
	resolveLinterConfig,
} from "../../core/config/index.js";
import { ConfigError } from "../../core/errors.js";
import type { JSONValue, LinterConfig } from "../../core/types/index.js";
import { debugLog, errorMessage } from "../utils/debug.js";
import { fs, fsPromises, path } from "../utils/node-mods.js";

export const DEFAULT_CONFIG_FILE = "guidelint.config.json";

function parseJSON(text: string, configPath: string): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(text),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: `invalid JSON: ${errorMessage(error)}`,
			}),
	});
}

/**
 * Загружает конфигурацию линтера.
 *
 * @param configPath Явный путь из --config; без него ищется guidelint.config.json в cwd
 * @param cwd Рабочая директория
 * @returns Effect с полной конфигурацией или ConfigError
 *
 * @example
 * ```ts
 * const config = await Effect.runPromise(loadLinterConfig());
 * config.rules.semicolon.severity; // "error"
 * ```
 */
export function loadLinterConfig(
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<LinterConfig, ConfigError> {
	const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

	return Effect.gen(function* (_) {
		const exists = yield* _(Effect.sync(() => fs.existsSync(resolved)));
		if (!exists) {
			if (configPath !== undefined) {
				return yield* _(
					Effect.fail(
						new ConfigError({ path: resolved, detail: "file not found" }),
					),
				);
			}
			debugLog(`no ${DEFAULT_CONFIG_FILE} in ${cwd}, using defaults`);
			return defaultLinterConfig();
		}

		const text = yield* _(
			Effect.tryPromise({
				try: () => fsPromises.readFile(resolved, "utf8"),
				catch: (error) =>
					new ConfigError({
						path: resolved,
						detail: `cannot read file: ${errorMessage(error)}`,
					}),
			}),
		);
		const json = yield* _(parseJSON(text, resolved));
		const config = yield* _(
			pipe(
				resolveLinterConfig(json),
				Either.mapLeft((detail) => new ConfigError({ path: resolved, detail })),
			),
		);
		debugLog(`loaded configuration from ${resolved}`);
		return config;
	});
}
