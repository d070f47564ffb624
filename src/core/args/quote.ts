// CHANGE: Quote stripping for raw command-line tokens
// WHY: Shells may hand quoted tokens through unchanged
// PURITY: CORE
// INVARIANT: At most one matching pair of surrounding quotes is removed
// COMPLEXITY: O(n) where n = |value|

const QUOTE_CHARACTERS: readonly string[] = ['"', "'"];

/**
 * True when `value` starts and ends with the same quote character.
 *
 * @pure true
 * @invariant value.length < 2 → false
 * @complexity O(1)
 */
export function isQuoted(value: string): boolean {
	if (value.length < 2) return false;
	const first = value.charAt(0);
	return QUOTE_CHARACTERS.includes(first) && value.endsWith(first);
}

/**
 * Removes one matching pair of surrounding quotes, if present.
 *
 * @pure true
 * @postcondition ¬isQuoted(value) → unquote(value) === value
 * @complexity O(n)
 *
 * @example
 * ```ts
 * unquote('"build.cake"'); // "build.cake"
 * unquote("'a b'");        // "a b"
 * unquote('"mixed\'');     // '"mixed\''
 * ```
 */
export function unquote(value: string): string {
	return isQuoted(value) ? value.slice(1, -1) : value;
}
