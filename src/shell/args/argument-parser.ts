// CHANGE: Parser facade that reports usage errors through a diagnostic sink
// WHY: CORE returns errors as values; printing them belongs to SHELL
// PURITY: SHELL (writes to the sink)
// EFFECT: Effect<BuildOptions, ParseFailure | InvalidBooleanValue>
// INVARIANT: Every usage error of a failed parse reaches the sink exactly once, in order
// COMPLEXITY: O(n·k) — delegates to CORE parseArguments

import { Effect, Either } from "effect";

import { type ParserSettings, parseArguments } from "../../core/args/parser.js";
import { InvalidBooleanValue, type ParseFailure } from "../../core/errors.js";
import { formatUsageError } from "../../core/format/messages.js";
import type { BuildOptions, ScriptPath } from "../../core/models.js";
import {
	defaultVerbosityResolver,
	type VerbosityResolver,
} from "../../core/verbosity.js";
import type { DiagnosticSink } from "../diagnostics/sink.js";

export interface ArgumentParserDeps {
	readonly sink: DiagnosticSink;
	readonly resolver?: VerbosityResolver;
	readonly defaultScript?: ScriptPath;
}

export interface ArgumentParser {
	/**
	 * Callers must check `hasError` before trusting any other field.
	 *
	 * @throws InvalidInput when args is null or undefined
	 * @throws InvalidBooleanValue when a flag carries a non-boolean literal
	 */
	readonly parse: (args: readonly string[] | null | undefined) => BuildOptions;
}

/**
 * Writes every usage error of a failed parse to the sink.
 *
 * @pure false (sink output)
 */
export function reportParseFailure(
	failure: ParseFailure,
	sink: DiagnosticSink,
): void {
	for (const error of failure.errors) {
		sink.error(formatUsageError(error));
	}
}

/**
 * Builds a parser bound to its collaborators.
 *
 * @example
 * ```ts
 * const parser = createArgumentParser({ sink: createConsoleSink() });
 * const options = parser.parse(process.argv.slice(2));
 * if (options.hasError) {
 *   // show usage, do not start a build
 * }
 * ```
 */
export function createArgumentParser(deps: ArgumentParserDeps): ArgumentParser {
	const settings: ParserSettings = {
		resolver: deps.resolver ?? defaultVerbosityResolver,
		defaultScript: deps.defaultScript,
	};
	return {
		parse: (args) =>
			Either.match(parseArguments(args, settings), {
				onLeft: (failure) => {
					reportParseFailure(failure, deps.sink);
					return failure.options;
				},
				onRight: (options) => options,
			}),
	};
}

/**
 * Lifts the parse into Effect: usage errors and the invalid-boolean fault
 * both land on the typed error channel; anything else stays a defect.
 *
 * @effect Effect<BuildOptions, ParseFailure | InvalidBooleanValue>
 */
export function parseArgumentsEffect(
	args: readonly string[],
	settings: ParserSettings,
): Effect.Effect<BuildOptions, ParseFailure | InvalidBooleanValue> {
	return Effect.sync(() => parseArguments(args, settings)).pipe(
		Effect.catchAllDefect(
			(defect): Effect.Effect<never, InvalidBooleanValue> =>
				defect instanceof InvalidBooleanValue
					? Effect.fail(defect)
					: Effect.die(defect),
		),
		Effect.flatMap(
			(result): Effect.Effect<BuildOptions, ParseFailure> =>
				Either.match(result, {
					onLeft: (failure) => Effect.fail(failure),
					onRight: (options) => Effect.succeed(options),
				}),
		),
	);
}
