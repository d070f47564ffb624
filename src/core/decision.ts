// CHANGE: Pure selection of the launcher command from parsed options
// WHY: Which command runs is decided from values, before any IO
// PURITY: CORE
// FORMAT THEOREM: ∀o ∈ BuildOptions: o.hasError ↔ selectCommand(o)._tag = "Usage"
// INVARIANT: First matching flag wins, in the order help, version, description, dry run, debug, bootstrap
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { BuildOptions, ExitCode, ScriptPath, Verbosity } from "./models.js";

/**
 * How a script command runs the build script.
 */
export type ScriptMode =
	| "Description"
	| "DryRun"
	| "Debug"
	| "Bootstrap"
	| "Build";

/**
 * Hand-off record for the build engine.
 */
export interface ScriptCommand {
	readonly _tag: "Script";
	readonly mode: ScriptMode;
	readonly script: ScriptPath;
	readonly verbosity: Verbosity;
	readonly mono: boolean;
	readonly arguments: ReadonlyMap<string, string>;
}

export type LauncherCommand =
	| { readonly _tag: "Usage" }
	| { readonly _tag: "Help" }
	| { readonly _tag: "Version" }
	| ScriptCommand;

const scriptCommand = (
	mode: ScriptMode,
	options: BuildOptions,
): ScriptCommand => ({
	_tag: "Script",
	mode,
	script: options.script,
	verbosity: options.verbosity,
	mono: options.mono,
	arguments: options.arguments,
});

/**
 * Picks the command to run for a parse result.
 *
 * @pure true
 * @invariant options.hasError → "Usage"
 * @complexity O(1)
 *
 * @example
 * ```ts
 * selectCommand({ ...createDefaultOptions(), performDryRun: true });
 * // { _tag: "Script", mode: "DryRun", script: "./build.cake", ... }
 * ```
 */
export function selectCommand(options: BuildOptions): LauncherCommand {
	return match(options)
		.returnType<LauncherCommand>()
		.with({ hasError: true }, () => ({ _tag: "Usage" }))
		.with({ showHelp: true }, () => ({ _tag: "Help" }))
		.with({ showVersion: true }, () => ({ _tag: "Version" }))
		.with({ showDescription: true }, (o) => scriptCommand("Description", o))
		.with({ performDryRun: true }, (o) => scriptCommand("DryRun", o))
		.with({ performDebug: true }, (o) => scriptCommand("Debug", o))
		.with({ bootstrap: true }, (o) => scriptCommand("Bootstrap", o))
		.otherwise((o) => scriptCommand("Build", o));
}

/**
 * Final exit code for a command whose runner reported `runnerCode`.
 *
 * @pure true
 * @invariant command._tag = "Usage" → 1
 * @complexity O(1)
 */
export function computeExitCode(
	command: LauncherCommand,
	runnerCode: ExitCode,
): ExitCode {
	return command._tag === "Usage" ? 1 : runnerCode;
}
