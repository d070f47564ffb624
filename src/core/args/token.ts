// CHANGE: Option-token recognition and name/value splitting
// WHY: "-name" and "--name" are the same option; "=" splits name from value
// PURITY: CORE
// INVARIANT: Whitespace-only tokens are never options
// COMPLEXITY: O(n) where n = |token|

import { unquote } from "./quote.js";

/**
 * Name and value of one option token.
 *
 * @property name Text between the dash prefix and the first "=", as supplied
 * @property value Text after the first "=", unquoted once; "" when absent
 */
export interface OptionToken {
	readonly name: string;
	readonly value: string;
}

/**
 * Decides whether an (already unquoted) token is an option.
 *
 * @pure true
 * @invariant token.trim() === "" → false
 * @complexity O(n)
 */
export function isOptionToken(token: string): boolean {
	if (token.trim().length === 0) return false;
	return token.startsWith("-");
}

/**
 * Splits `--name=value` / `-name=value` / `--name` into name and value.
 *
 * @pure true
 * @precondition isOptionToken(token)
 * @postcondition no "=" in token → value === ""
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitOption("--verbosity=Diagnostic"); // { name: "verbosity", value: "Diagnostic" }
 * splitOption('-target="Pack"');         // { name: "target", value: "Pack" }
 * splitOption("--debug");                // { name: "debug", value: "" }
 * ```
 */
export function splitOption(token: string): OptionToken {
	const nameStart = token.startsWith("--") ? 2 : 1;
	const separator = token.indexOf("=");
	if (separator < 0) {
		return { name: token.slice(nameStart), value: "" };
	}
	return {
		name: token.slice(nameStart, separator),
		value: unquote(token.slice(separator + 1)),
	};
}
