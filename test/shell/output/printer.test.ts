// CHANGE: Report sink tests
// INVARIANT: The report reaches stdout or the file unchanged

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { writeReport } from "../../../src/shell/output/printer.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("writeReport", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("prints to stdout without an output path", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		await Effect.runPromise(writeReport("✔ No style violations found.", undefined));

		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith("✔ No style violations found.");
	});

	it("writes the report to a file, creating directories", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		project = createTempProject();

		await Effect.runPromise(
			writeReport('{"files":[]}', "reports/out.json", project.cwd),
		);

		expect(project.read("reports/out.json")).toBe('{"files":[]}\n');
		expect(log).toHaveBeenCalledWith("📝 Report written to reports/out.json");
	});

	it("fails with an FSError when the target cannot be written", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		project = createTempProject({ "taken.txt": "" });

		const result = await Effect.runPromise(
			Effect.either(writeReport("x", "taken.txt/out.json", project.cwd)),
		);

		expect(
			Either.match(result, {
				onLeft: (error) => `${error._tag} ${error.path ?? ""}`,
				onRight: () => "written",
			}),
		).toBe("FS taken.txt/out.json");
	});
});
