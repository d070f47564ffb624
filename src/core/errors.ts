// CHANGE: Typed error ADT for argument parsing using Effect.Data
// WHY: Usage errors travel as typed values; only faults are thrown
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; only faults are thrown
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { BuildOptions } from "./models.js";

/**
 * A second bare (non-option) token followed the script path.
 *
 * @pure true (Data class)
 */
export class MultipleScriptsSpecified extends Data.TaggedError(
	"MultipleScriptsSpecified",
)<{
	readonly token: string;
}> {}

/**
 * The same option name appeared twice, compared ignoring case.
 *
 * @pure true (Data class)
 * @invariant option is the spelling of the second occurrence
 */
export class DuplicateArgument extends Data.TaggedError("DuplicateArgument")<{
	readonly option: string;
}> {}

/**
 * The verbosity resolver rejected the supplied value.
 *
 * @pure true (Data class)
 */
export class InvalidVerbosity extends Data.TaggedError("InvalidVerbosity")<{
	readonly value: string;
}> {}

/**
 * Recoverable errors that invalidate one invocation.
 */
export type UsageError =
	| MultipleScriptsSpecified
	| DuplicateArgument
	| InvalidVerbosity;

/**
 * Failure side of a parse: what was built so far plus every usage error.
 *
 * @pure true (Data class)
 * @invariant options.hasError === true ∧ errors.length > 0
 */
export class ParseFailure extends Data.TaggedError("ParseFailure")<{
	readonly options: BuildOptions;
	readonly errors: readonly UsageError[];
}> {}

/**
 * A boolean option carried a literal other than true/false.
 * Thrown: aborts the whole parse instead of being recorded.
 *
 * @pure true (Data class)
 */
export class InvalidBooleanValue extends Data.TaggedError(
	"InvalidBooleanValue",
)<{
	readonly option: string;
	readonly value: string;
	readonly message: string;
}> {}

/**
 * Precondition fault: the argument sequence itself was missing.
 *
 * @pure true (Data class)
 */
export class InvalidInput extends Data.TaggedError("InvalidInput")<{
	readonly detail: string;
	readonly message: string;
}> {}

/**
 * Launcher configuration could not be read or validated.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}
