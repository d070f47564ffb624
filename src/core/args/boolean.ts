// CHANGE: Boolean literal parsing for flag options
// WHY: A bare flag means true; a bad literal aborts the whole parse
// PURITY: CORE
// INVARIANT: Only "", whitespace, "true" and "false" (any case) are accepted
// COMPLEXITY: O(n) where n = |value|

import { InvalidBooleanValue } from "../errors.js";

/**
 * Parses the value of a boolean option.
 *
 * A bare flag (empty or whitespace value) means true. Any other literal
 * aborts the parse by throwing, rather than being recorded as a usage error.
 *
 * @param option Option name, used for the fault only
 * @throws InvalidBooleanValue when value is not a boolean literal
 *
 * @pure true (throws on invalid input)
 * @complexity O(n)
 */
export function parseBooleanValue(option: string, value: string): boolean {
	if (value.trim().length === 0) return true;
	const normalized = value.toLowerCase();
	if (normalized === "true") return true;
	if (normalized === "false") return false;
	throw new InvalidBooleanValue({
		option,
		value,
		message: `Argument value '${value}' of option '${option}' is not a valid boolean value.`,
	});
}
