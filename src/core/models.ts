// CHANGE: Functional Core domain models for the build launcher
// WHY: Parser, decision and formatting share one immutable options record
// PURITY: CORE
// INVARIANT: CORE defines no effects; records are immutable once returned
// COMPLEXITY: O(1) unless noted

import { Brand } from "effect";

/**
 * Exit code for the launcher process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Logging detail level, ordered from least to most output.
 */
export type Verbosity = "Quiet" | "Minimal" | "Normal" | "Verbose" | "Diagnostic";

export const VERBOSITY_LEVELS: readonly Verbosity[] = [
	"Quiet",
	"Minimal",
	"Normal",
	"Verbose",
	"Diagnostic",
];

export const DEFAULT_VERBOSITY: Verbosity = "Normal";

/**
 * Path of a build script. Constructed from the raw string without
 * normalisation or any filesystem access.
 */
export type ScriptPath = string & Brand.Brand<"ScriptPath">;

export const ScriptPath = Brand.nominal<ScriptPath>();

export const DEFAULT_SCRIPT_PATH: ScriptPath = ScriptPath("./build.cake");

/**
 * Result of interpreting the launcher's command line.
 *
 * @property script Build script to run; the default path when none was given
 * @property arguments Every option seen, keyed by the name as supplied
 * @property hasError True when a usage error was detected; other fields may be partial
 *
 * @invariant no two keys of `arguments` are equal ignoring case
 */
export interface BuildOptions {
	readonly script: ScriptPath;
	readonly verbosity: Verbosity;
	readonly showDescription: boolean;
	readonly performDryRun: boolean;
	readonly showHelp: boolean;
	readonly showVersion: boolean;
	readonly performDebug: boolean;
	readonly mono: boolean;
	readonly bootstrap: boolean;
	readonly arguments: ReadonlyMap<string, string>;
	readonly hasError: boolean;
}

/**
 * Builds the record used when no arguments are supplied.
 *
 * @pure true
 * @invariant all flags false, verbosity Normal, arguments empty
 * @complexity O(1)
 */
export function createDefaultOptions(
	script: ScriptPath = DEFAULT_SCRIPT_PATH,
): BuildOptions {
	return {
		script,
		verbosity: DEFAULT_VERBOSITY,
		showDescription: false,
		performDryRun: false,
		showHelp: false,
		showVersion: false,
		performDebug: false,
		mono: false,
		bootstrap: false,
		arguments: new Map(),
		hasError: false,
	};
}

/**
 * Finds the stored key matching `name` ignoring case.
 *
 * @pure true
 * @complexity O(n) where n = |arguments|
 */
export function findArgumentKey(
	args: ReadonlyMap<string, string>,
	name: string,
): string | undefined {
	const wanted = name.toLowerCase();
	for (const key of args.keys()) {
		if (key.toLowerCase() === wanted) return key;
	}
	return undefined;
}

/**
 * Case-insensitive lookup of an option value.
 *
 * @pure true
 * @postcondition result === undefined ⇔ no key equals name ignoring case
 * @complexity O(n) where n = |arguments|
 */
export function getArgument(
	options: BuildOptions,
	name: string,
): string | undefined {
	const key = findArgumentKey(options.arguments, name);
	return key === undefined ? undefined : options.arguments.get(key);
}
