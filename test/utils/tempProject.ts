// CHANGE: Isolated temporary directories for shell and app tests
// INVARIANT: Every project lives under os.tmpdir() and is removed by cleanup()

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly write: (relativePath: string, content: string) => string;
	readonly read: (relativePath: string) => string;
	readonly cleanup: () => void;
}

/**
 * Creates a temporary project populated with the given files.
 *
 * @param files Relative path → file contents
 */
export function createTempProject(
	files: Readonly<Record<string, string>> = {},
): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "guidelint-"));
	const write = (relativePath: string, content: string): string => {
		const target = path.join(cwd, relativePath);
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, { encoding: "utf-8" });
		return target;
	};
	for (const [relativePath, content] of Object.entries(files)) {
		write(relativePath, content);
	}
	return {
		cwd,
		write,
		read: (relativePath) =>
			fs.readFileSync(path.join(cwd, relativePath), { encoding: "utf-8" }),
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
