// CHANGE: Help screen derived from the recognised-option table
// WHY: Help text lists the same aliases the parser accepts
// PURITY: CORE
// COMPLEXITY: O(n) where n = |RECOGNIZED_OPTIONS|

import {
	type OptionDescriptor,
	RECOGNIZED_OPTIONS,
} from "../args/option-kind.js";

/** "--dryrun, --noop, --whatif[=<bool>]" */
export function formatOptionLabel(descriptor: OptionDescriptor): string {
	const names = descriptor.names
		.map((name) => (name.length === 1 ? `-${name}` : `--${name}`))
		.join(", ");
	return descriptor.valueHint === "bool"
		? `${names}[=<bool>]`
		: `${names}=<${descriptor.valueHint}>`;
}

/**
 * Lines of the help screen.
 *
 * @pure true
 * @invariant one line per recognised option, labels padded to a common width
 * @complexity O(n)
 */
export function formatUsage(program: string): readonly string[] {
	const rows = RECOGNIZED_OPTIONS.map(
		(descriptor) =>
			[formatOptionLabel(descriptor), descriptor.description] as const,
	);
	const width = Math.max(...rows.map(([label]) => label.length));
	return [
		`Usage: ${program} [script] [options]`,
		"",
		"Options:",
		...rows.map(
			([label, description]) => `  ${label.padEnd(width)}  ${description}`,
		),
		"",
		"Any other --name=value option is passed through to the script.",
	];
}
