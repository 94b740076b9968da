// CHANGE: E2E tests for the programmatic entry point
// INVARIANT: main() resolves to an exit code and never terminates the process

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { main } from "../../src/main.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

describe("main", () => {
	const originalArgv = process.argv.slice();
	let project: TempProject;
	let stdout: string[];
	let stderr: string[];

	const withArgs = (...args: string[]): void => {
		process.argv = [originalArgv[0] ?? "node", "guidelint", ...args];
	};

	beforeEach(() => {
		project = createTempProject({
			"src/index.js": [
				"import { helper } from './helper.js';",
				"",
				"export function Run_task(value) {",
				"  if (value == 1) {",
				'    return helper("x");',
				"  }",
				"  return helper('y');",
				"}",
				"",
			].join("\n"),
			"src/helper.js": "export const helper = (name) => name;\n",
		});
		stdout = [];
		stderr = [];
		vi.spyOn(process, "cwd").mockReturnValue(project.cwd);
		vi.spyOn(console, "log").mockImplementation((message: string) => {
			stdout.push(message);
		});
		vi.spyOn(console, "error").mockImplementation((message: string) => {
			stderr.push(message);
		});
	});

	afterEach(() => {
		process.argv = originalArgv;
		project.cleanup();
	});

	it("lints the working directory by default", async () => {
		withArgs();

		expect(await main()).toBe(1);
		expect(stdout).toEqual([
			[
				"src/index.js",
				"  3:17  error    Function name 'Run_task' should be camelCase or PascalCase.  naming-convention",
				"  4:13  error    Expected '===' and instead saw '=='.  eqeqeq",
				"  5:19  error    Strings must use singlequote.  quote-style",
				"",
				"✖ 3 problems (3 errors, 0 warnings)",
			].join("\n"),
		]);
	});

	it("applies options given on the command line", async () => {
		withArgs("src/helper.js", "--format", "json");

		expect(await main()).toBe(0);
		const [printed] = stdout;
		expect(JSON.parse(printed ?? "")).toEqual({
			files: [
				{ filePath: "src/helper.js", violations: [], errorCount: 0, warningCount: 0 },
			],
			fileCount: 1,
			errorCount: 0,
			warningCount: 0,
		});
	});

	it("exits 2 with usage on bad arguments", async () => {
		withArgs("--format", "xml");

		expect(await main()).toBe(2);
		expect(stdout).toEqual([]);
		expect(stderr[0]?.split("\n")[0]).toBe(
			'❌ unknown format "xml" (expected stylish, json or sarif)',
		);
	});
});
