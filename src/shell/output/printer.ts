// CHANGE: Report sink: stdout or a file given by --output
// PURITY: SHELL
// EFFECT: Effect<void, FSError>
// INVARIANT: The report text is written unchanged

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { errorMessage } from "../utils/debug.js";
import { fsPromises, path } from "../utils/node-mods.js";

/**
 * Выводит отчёт в stdout или записывает его в файл.
 *
 * @param report Отформатированный отчёт
 * @param outputPath Файл из --output; undefined означает stdout
 * @param cwd Директория, относительно которой разрешается outputPath
 */
export function writeReport(
	report: string,
	outputPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<void, FSError> {
	if (outputPath === undefined) {
		return Effect.sync(() => {
			console.log(report);
		});
	}
	const target = path.resolve(cwd, outputPath);
	return Effect.gen(function* (_) {
		yield* _(
			Effect.tryPromise({
				try: async () => {
					await fsPromises.mkdir(path.dirname(target), { recursive: true });
					await fsPromises.writeFile(target, `${report}\n`, "utf8");
				},
				catch: (error) =>
					new FSError({
						detail: `cannot write report: ${errorMessage(error)}`,
						path: outputPath,
					}),
			}),
		);
		console.log(`📝 Report written to ${outputPath}`);
	});
}
