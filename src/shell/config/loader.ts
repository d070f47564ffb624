// CHANGE: Load optional launcher.config.json from the working directory
// WHY: The default script can be changed per repository without command-line flags
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<LauncherConfig, ConfigError>
// INVARIANT: A missing file yields defaults; every other failure is a ConfigError value
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Option } from "effect";

import { ConfigError } from "../../core/errors.js";
import { DEFAULT_SCRIPT_PATH, ScriptPath } from "../../core/models.js";

export const CONFIG_FILE_NAME = "launcher.config.json";

/**
 * Settings read from launcher.config.json.
 *
 * @property defaultScript Script used when the command line names none
 */
export interface LauncherConfig {
	readonly defaultScript: ScriptPath;
}

export const DEFAULT_CONFIG: LauncherConfig = {
	defaultScript: DEFAULT_SCRIPT_PATH,
};

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

function readConfigText(
	configPath: string,
): Effect.Effect<Option.Option<string>, ConfigError> {
	return Effect.try({
		try: () =>
			fs.existsSync(configPath)
				? Option.some(fs.readFileSync(configPath, "utf8"))
				: Option.none(),
		catch: (error) =>
			new ConfigError({ path: configPath, detail: describe(error) }),
	});
}

function parseConfigJSON(
	configPath: string,
	raw: string,
): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: () => JSON.parse(raw) as JSONValue,
		catch: (error) =>
			new ConfigError({ path: configPath, detail: describe(error) }),
	});
}

/**
 * Validates the parsed JSON against the LauncherConfig shape.
 *
 * @pure true
 * @postcondition unknown keys are ignored
 */
export function validateConfig(
	configPath: string,
	value: JSONValue,
): Effect.Effect<LauncherConfig, ConfigError> {
	if (!isJSONObject(value)) {
		return Effect.fail(
			new ConfigError({
				path: configPath,
				detail: "configuration must be a JSON object",
			}),
		);
	}
	const defaultScript = value["defaultScript"];
	if (defaultScript === undefined) {
		return Effect.succeed(DEFAULT_CONFIG);
	}
	if (typeof defaultScript !== "string" || defaultScript.trim().length === 0) {
		return Effect.fail(
			new ConfigError({
				path: configPath,
				detail: "defaultScript must be a non-empty string",
			}),
		);
	}
	return Effect.succeed({ defaultScript: ScriptPath(defaultScript) });
}

/**
 * Loads launcher settings.
 *
 * @param configPath Defaults to launcher.config.json in the current directory
 *
 * @example
 * ```ts
 * const config = await Effect.runPromise(loadLauncherConfig());
 * // { defaultScript: "./build.cake" } when no file exists
 * ```
 */
export function loadLauncherConfig(
	configPath = path.resolve(process.cwd(), CONFIG_FILE_NAME),
): Effect.Effect<LauncherConfig, ConfigError> {
	return Effect.gen(function* () {
		const text = yield* readConfigText(configPath);
		if (Option.isNone(text)) {
			return DEFAULT_CONFIG;
		}
		const json = yield* parseConfigJSON(configPath, text.value);
		return yield* validateConfig(configPath, json);
	});
}
