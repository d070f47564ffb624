// CHANGE: Fixed table of recognised options, classified into a tagged kind
// WHY: One exhaustive dispatch per option instead of one predicate per name
// PURITY: CORE
// INVARIANT: Every name maps to exactly one kind; unknown names are Passthrough
// COMPLEXITY: O(1) per lookup after module initialisation

/**
 * Semantic category of an option. Exactly one per option occurrence.
 */
export type OptionKind =
	| "Verbosity"
	| "ShowDescription"
	| "DryRun"
	| "Help"
	| "Version"
	| "Debug"
	| "Mono"
	| "Bootstrap"
	| "Passthrough";

export type RecognizedOptionKind = Exclude<OptionKind, "Passthrough">;

/**
 * One row of the recognised-option table.
 *
 * @property names Accepted spellings, lower case, first one preferred in help text
 * @property valueHint Placeholder shown in help text ("bool" for flags)
 */
export interface OptionDescriptor {
	readonly kind: RecognizedOptionKind;
	readonly names: readonly string[];
	readonly valueHint: string;
	readonly description: string;
}

export const RECOGNIZED_OPTIONS: readonly OptionDescriptor[] = [
	{
		kind: "Verbosity",
		names: ["verbosity", "v"],
		valueHint: "level",
		description:
			"Output detail: Quiet, Minimal, Normal, Verbose or Diagnostic.",
	},
	{
		kind: "ShowDescription",
		names: ["showdescription", "s"],
		valueHint: "bool",
		description: "Show the descriptions of the script's tasks.",
	},
	{
		kind: "DryRun",
		names: ["dryrun", "noop", "whatif"],
		valueHint: "bool",
		description: "Walk through the script without running any task.",
	},
	{
		kind: "Debug",
		names: ["debug", "d"],
		valueHint: "bool",
		description: "Wait for a debugger to attach before running.",
	},
	{
		kind: "Mono",
		names: ["mono"],
		valueHint: "bool",
		description: "Use the Mono script host.",
	},
	{
		kind: "Bootstrap",
		names: ["bootstrap"],
		valueHint: "bool",
		description: "Restore the script's modules and exit.",
	},
	{
		kind: "Version",
		names: ["version", "ver"],
		valueHint: "bool",
		description: "Display version information.",
	},
	{
		kind: "Help",
		names: ["help", "?"],
		valueHint: "bool",
		description: "Display this help.",
	},
];

const KIND_BY_NAME: ReadonlyMap<string, RecognizedOptionKind> = new Map(
	RECOGNIZED_OPTIONS.flatMap((descriptor) =>
		descriptor.names.map((name): [string, RecognizedOptionKind] => [
			name,
			descriptor.kind,
		]),
	),
);

/**
 * Classifies an option name against the fixed table, ignoring case.
 *
 * @pure true
 * @postcondition name not in table → "Passthrough"
 * @complexity O(n) where n = |name|
 *
 * @example
 * ```ts
 * classifyOption("WhatIf");  // "DryRun"
 * classifyOption("?");       // "Help"
 * classifyOption("target");  // "Passthrough"
 * ```
 */
export function classifyOption(name: string): OptionKind {
	return KIND_BY_NAME.get(name.toLowerCase()) ?? "Passthrough";
}
