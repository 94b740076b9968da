import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { defaultLinterConfig } from "../../../src/core/config/index.js";
import type { ConfigError } from "../../../src/core/errors.js";
import type { LinterConfig } from "../../../src/core/types/index.js";
import { loadLinterConfig } from "../../../src/shell/config/index.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";
import { settle } from "../../utils/builders.js";

describe("loadLinterConfig", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	const failureOf = (result: Either.Either<LinterConfig, ConfigError>) =>
		Either.match(result, {
			onLeft: (error) => ({ tag: error._tag, path: error.path, detail: error.detail }),
			onRight: () => ({ tag: "none", path: "", detail: "" }),
		});

	const load = (files: Readonly<Record<string, string>>, configPath?: string) => {
		const created = createTempProject(files);
		project = created;
		return Effect.runPromise(
			Effect.either(loadLinterConfig(configPath, created.cwd)),
		).then((result) => ({ result, cwd: created.cwd }));
	};

	it("falls back to defaults without guidelint.config.json", async () => {
		const { result } = await load({});
		expect(settle(result)).toEqual({ right: defaultLinterConfig() });
	});

	it("reads guidelint.config.json from the working directory", async () => {
		const { result } = await load({
			"guidelint.config.json": JSON.stringify({
				ignore: ["vendor"],
				rules: { semicolon: ["warning", { mode: "never" }] },
			}),
		});

		const config = Either.getOrThrow(result);
		expect(config.ignore).toEqual(["vendor"]);
		expect(config.rules.semicolon).toEqual({
			severity: "warning",
			options: { mode: "never" },
		});
	});

	it("reads an explicit path relative to cwd", async () => {
		const { result } = await load(
			{ "conf/strict.json": '{ "rules": { "eqeqeq": "warn" } }' },
			"conf/strict.json",
		);
		expect(settle(Either.map(result, (c) => c.rules.eqeqeq.severity))).toEqual(
			{ right: "warning" },
		);
	});

	it("fails for a missing explicit file", async () => {
		const { result, cwd } = await load({}, "missing.json");
		expect(failureOf(result)).toEqual({
			tag: "ConfigError",
			path: path.join(cwd, "missing.json"),
			detail: "file not found",
		});
	});

	it("reports invalid JSON", async () => {
		const { result } = await load({ "guidelint.config.json": "{ rules: " });
		expect(failureOf(result).detail).toMatch(/^invalid JSON: /u);
	});

	it("reports validation failures with the file path", async () => {
		const { result, cwd } = await load({
			"guidelint.config.json": '{ "rules": { "no-var": "error" } }',
		});
		expect(failureOf(result)).toEqual({
			tag: "ConfigError",
			path: path.join(cwd, "guidelint.config.json"),
			detail: 'unknown rule "no-var"',
		});
	});
});
