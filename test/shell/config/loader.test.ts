// CHANGE: Tests for launcher.config.json loading against real temp directories

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { loadLauncherConfig } from "../../../src/shell/config/loader.js";
import { createTempProject } from "../../utils/tempProject.js";

const load = (configPath: string) =>
	Effect.runSync(Effect.either(loadLauncherConfig(configPath)));

describe("loadLauncherConfig", () => {
	it("falls back to defaults when the file is absent", (): void => {
		const t = createTempProject({});
		try {
			expect(Either.getOrUndefined(load(t.configPath))).toEqual({
				defaultScript: "./build.cake",
			});
		} finally {
			t.cleanup();
		}
	});

	it("reads defaultScript", (): void => {
		const t = createTempProject({
			configText: '{ "defaultScript": "./ci/build.cake" }',
		});
		try {
			const result = load(t.configPath);
			expect(Either.getOrUndefined(result)?.defaultScript).toBe(
				"./ci/build.cake",
			);
		} finally {
			t.cleanup();
		}
	});

	it("ignores unknown keys and keeps defaults", (): void => {
		const t = createTempProject({ configText: '{ "colors": false }' });
		try {
			expect(Either.getOrUndefined(load(t.configPath))?.defaultScript).toBe(
				"./build.cake",
			);
		} finally {
			t.cleanup();
		}
	});

	it.each([
		["[1, 2]", "configuration must be a JSON object"],
		['{ "defaultScript": 3 }', "defaultScript must be a non-empty string"],
		['{ "defaultScript": "  " }', "defaultScript must be a non-empty string"],
	])("rejects %s", (configText, detail): void => {
		const t = createTempProject({ configText });
		try {
			const result = load(t.configPath);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left._tag).toBe("ConfigError");
				expect(result.left.path).toBe(t.configPath);
				expect(result.left.detail).toBe(detail);
			}
		} finally {
			t.cleanup();
		}
	});

	it("reports malformed JSON as a ConfigError", (): void => {
		const t = createTempProject({ configText: "{ not json" });
		try {
			const result = load(t.configPath);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left._tag).toBe("ConfigError");
				expect(result.left.detail.length).toBeGreaterThan(0);
			}
		} finally {
			t.cleanup();
		}
	});
});
