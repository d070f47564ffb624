// CHANGE: Argument parser as an explicit two-phase state machine over tokens
// WHY: The first token alone may name the script; naming the two phases keeps that transition explicit
// PURITY: CORE
// EFFECT: none; returns Either<BuildOptions, ParseFailure>, throws only faults
// INVARIANT: The leading phase lasts exactly one token; usage errors never escape as exceptions
// COMPLEXITY: O(n·k) where n = |args|, k = |arguments| (duplicate lookup)

import { Either, Option, pipe } from "effect";
import { match } from "ts-pattern";

import {
	DuplicateArgument,
	InvalidInput,
	InvalidVerbosity,
	MultipleScriptsSpecified,
	ParseFailure,
	type UsageError,
} from "../errors.js";
import {
	type BuildOptions,
	createDefaultOptions,
	DEFAULT_SCRIPT_PATH,
	DEFAULT_VERBOSITY,
	findArgumentKey,
	ScriptPath,
} from "../models.js";
import type { VerbosityResolver } from "../verbosity.js";
import { parseBooleanValue } from "./boolean.js";
import { classifyOption, type OptionKind } from "./option-kind.js";
import { unquote } from "./quote.js";
import { isOptionToken, splitOption } from "./token.js";

/**
 * Collaborators and defaults for one parse.
 *
 * @property defaultScript Script used when the first token is an option; "./build.cake" if omitted
 */
export interface ParserSettings {
	readonly resolver: VerbosityResolver;
	readonly defaultScript?: ScriptPath;
}

/**
 * "ScriptOrOption" applies to the first token only; every later token is
 * parsed in "OptionsOnly".
 */
type Phase = "ScriptOrOption" | "OptionsOnly";

interface ParseState {
	readonly options: BuildOptions;
	readonly errors: readonly UsageError[];
}

/**
 * Right: keep going. Left: stop; the state already holds the fatal error.
 */
type Step = Either.Either<ParseState, ParseState>;

interface RoutedOption {
	readonly options: BuildOptions;
	readonly error: Option.Option<InvalidVerbosity>;
}

const routed = (options: BuildOptions): RoutedOption => ({
	options,
	error: Option.none(),
});

function applyVerbosity(
	options: BuildOptions,
	value: string,
	resolver: VerbosityResolver,
): RoutedOption {
	return Option.match(resolver.tryParse(value), {
		onNone: (): RoutedOption => ({
			options: { ...options, verbosity: DEFAULT_VERBOSITY },
			error: Option.some(new InvalidVerbosity({ value })),
		}),
		onSome: (verbosity): RoutedOption => routed({ ...options, verbosity }),
	});
}

/**
 * Applies the single effect of one option kind.
 *
 * @pure true (throws InvalidBooleanValue for bad flag literals)
 * @invariant exactly one branch runs per option
 * @complexity O(1)
 */
function routeOption(
	options: BuildOptions,
	kind: OptionKind,
	name: string,
	value: string,
	resolver: VerbosityResolver,
): RoutedOption {
	const flag = (): boolean => parseBooleanValue(name, value);
	return match(kind)
		.with("Verbosity", () => applyVerbosity(options, value, resolver))
		.with("ShowDescription", () =>
			routed({ ...options, showDescription: flag() }),
		)
		.with("DryRun", () => routed({ ...options, performDryRun: flag() }))
		.with("Help", () => routed({ ...options, showHelp: flag() }))
		.with("Version", () => routed({ ...options, showVersion: flag() }))
		.with("Debug", () => routed({ ...options, performDebug: flag() }))
		.with("Mono", () => routed({ ...options, mono: flag() }))
		.with("Bootstrap", () => routed({ ...options, bootstrap: flag() }))
		.with("Passthrough", () => routed(options))
		.exhaustive();
}

function consumeOption(
	state: ParseState,
	token: string,
	resolver: VerbosityResolver,
): Step {
	const { name, value } = splitOption(token);
	const { options, error } = routeOption(
		state.options,
		classifyOption(name),
		name,
		value,
		resolver,
	);
	const errors = Option.match(error, {
		onNone: () => state.errors,
		onSome: (recorded): readonly UsageError[] => [...state.errors, recorded],
	});

	if (findArgumentKey(options.arguments, name) !== undefined) {
		return Either.left({
			options,
			errors: [...errors, new DuplicateArgument({ option: name })],
		});
	}

	const args = new Map(options.arguments);
	args.set(name, value);
	return Either.right({ options: { ...options, arguments: args }, errors });
}

function consumeLeadingToken(
	state: ParseState,
	token: string,
	resolver: VerbosityResolver,
	defaultScript: ScriptPath,
): Step {
	if (!isOptionToken(token)) {
		return Either.right({
			...state,
			options: { ...state.options, script: ScriptPath(token) },
		});
	}
	return pipe(
		consumeOption(state, token, resolver),
		Either.map((next) => ({
			...next,
			options: { ...next.options, script: defaultScript },
		})),
	);
}

function consumeTrailingToken(
	state: ParseState,
	token: string,
	resolver: VerbosityResolver,
): Step {
	if (isOptionToken(token)) {
		return consumeOption(state, token, resolver);
	}
	return Either.left({
		...state,
		errors: [...state.errors, new MultipleScriptsSpecified({ token })],
	});
}

const toFailure = (state: ParseState): ParseFailure =>
	new ParseFailure({
		options: { ...state.options, hasError: true },
		errors: state.errors,
	});

/**
 * Interprets raw process arguments as launcher options.
 *
 * The first token is either the script path or an option (then the default
 * script is used). Every later token must be an option. Unknown options are
 * kept in `arguments` for later stages.
 *
 * @param args Raw tokens, without the node executable and script entries
 * @returns Right(options) with hasError=false, or Left(ParseFailure) holding
 *   the partial record (hasError=true) and every usage error in order
 * @throws InvalidInput when args is null or undefined
 * @throws InvalidBooleanValue when a flag option carries a non-boolean literal
 *
 * @pure true
 * @invariant Right(o) → ¬o.hasError; Left(f) → f.options.hasError ∧ f.errors.length > 0
 * @complexity O(n·k) where n = |args|, k = |arguments|
 *
 * @example
 * ```ts
 * const result = parseArguments(["build.cake", "--target=Pack", "-v=d"], {
 *   resolver: defaultVerbosityResolver,
 * });
 * // Either.right({ script: "build.cake", verbosity: "Diagnostic", arguments: Map { target → Pack, v → d }, ... })
 * ```
 */
export function parseArguments(
	args: readonly string[] | null | undefined,
	settings: ParserSettings,
): Either.Either<BuildOptions, ParseFailure> {
	if (args === null || args === undefined) {
		throw new InvalidInput({
			detail: "args",
			message: "Argument sequence must be provided.",
		});
	}

	const defaultScript = settings.defaultScript ?? DEFAULT_SCRIPT_PATH;
	let state: ParseState = {
		options: createDefaultOptions(defaultScript),
		errors: [],
	};
	let phase: Phase = "ScriptOrOption";

	for (const raw of args) {
		const token = unquote(raw);
		const step = match<Phase, Step>(phase)
			.with("ScriptOrOption", () =>
				consumeLeadingToken(state, token, settings.resolver, defaultScript),
			)
			.with("OptionsOnly", () =>
				consumeTrailingToken(state, token, settings.resolver),
			)
			.exhaustive();
		phase = "OptionsOnly";

		if (Either.isLeft(step)) {
			return Either.left(toFailure(step.left));
		}
		state = step.right;
	}

	return state.errors.length === 0
		? Either.right(state.options)
		: Either.left(toFailure(state));
}
