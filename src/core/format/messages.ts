// CHANGE: Terminal text for usage errors and script commands
// WHY: Error text is built from values so the sink only prints
// PURITY: CORE
// INVARIANT: Deterministic mapping from values to text; no IO
// COMPLEXITY: O(n) where n = |arguments|

import { match } from "ts-pattern";

import { classifyOption } from "../args/option-kind.js";
import type { ScriptCommand } from "../decision.js";
import type { UsageError } from "../errors.js";

/**
 * Human-readable text for a usage error.
 *
 * @pure true
 * @invariant exhaustive over UsageError
 * @complexity O(1)
 */
export function formatUsageError(error: UsageError): string {
	return match(error)
		.with(
			{ _tag: "MultipleScriptsSpecified" },
			() => "More than one build script specified.",
		)
		.with(
			{ _tag: "DuplicateArgument" },
			(e) => `Multiple arguments with the same name (${e.option}).`,
		)
		.with(
			{ _tag: "InvalidVerbosity" },
			(e) => `The value '${e.value}' is not a valid verbosity.`,
		)
		.exhaustive();
}

/**
 * One-line summary of a script command. Only pass-through arguments are
 * listed; recognised options already show up in the mode and flags.
 *
 * @pure true
 * @complexity O(n) where n = |command.arguments|
 *
 * @example
 * ```ts
 * describeCommand({ _tag: "Script", mode: "DryRun", script: "./build.cake", verbosity: "Normal", mono: false, arguments: new Map([["target", "Pack"]]) });
 * // "DryRun ./build.cake (verbosity: Normal) target=Pack"
 * ```
 */
export function describeCommand(command: ScriptCommand): string {
	const flags = command.mono
		? `verbosity: ${command.verbosity}, mono`
		: `verbosity: ${command.verbosity}`;
	const head = `${command.mode} ${command.script} (${flags})`;
	const args = [...command.arguments]
		.filter(([name]) => classifyOption(name) === "Passthrough")
		.map(([name, value]) => (value.length === 0 ? name : `${name}=${value}`));
	return args.length === 0 ? head : `${head} ${args.join(" ")}`;
}
