// CHANGE: Default verbosity resolver (string → Verbosity)
// WHY: The parser takes the resolver as a collaborator; this is the one the launcher ships
// PURITY: CORE
// INVARIANT: Lookup is case-insensitive; unknown names resolve to None
// COMPLEXITY: O(1) per lookup

import { Option } from "effect";

import type { Verbosity } from "./models.js";

/**
 * Maps user-supplied text to a verbosity level.
 *
 * `Option.none()` means the text was not recognised; the parser then falls
 * back to "Normal" and records a usage error.
 */
export interface VerbosityResolver {
	readonly tryParse: (text: string) => Option.Option<Verbosity>;
}

const VERBOSITY_NAMES: ReadonlyMap<string, Verbosity> = new Map<
	string,
	Verbosity
>([
	["q", "Quiet"],
	["quiet", "Quiet"],
	["m", "Minimal"],
	["minimal", "Minimal"],
	["n", "Normal"],
	["normal", "Normal"],
	["v", "Verbose"],
	["verbose", "Verbose"],
	["d", "Diagnostic"],
	["diagnostic", "Diagnostic"],
]);

/**
 * Resolves full level names and their one-letter aliases.
 *
 * @pure true
 * @complexity O(n) where n = |text|
 *
 * @example
 * ```ts
 * tryParseVerbosity("diagnostic"); // Option.some("Diagnostic")
 * tryParseVerbosity(" Q ");        // Option.some("Quiet")
 * tryParseVerbosity("loud");       // Option.none()
 * ```
 */
export function tryParseVerbosity(text: string): Option.Option<Verbosity> {
	return Option.fromNullable(VERBOSITY_NAMES.get(text.trim().toLowerCase()));
}

export const defaultVerbosityResolver: VerbosityResolver = {
	tryParse: tryParseVerbosity,
};
