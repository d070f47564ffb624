// CHANGE: Public API entry point for library consumers
// WHY: One import path for APP, CORE and SHELL consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports are APP orchestration, CORE pure functions and SHELL facades
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Launcher orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { runLauncher } from "build-launcher";
 *
 * const exitCode = await runLauncher(["build.cake", "--verbosity=Diagnostic"]);
 * ```
 */
export {
	type BuildEngine,
	createDefaultServices,
	createPrintingEngine,
	type LauncherServices,
	runLauncher,
	runLauncherEffect,
	VERSION,
} from "./app/runLauncher.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Immutable Domain Models and Pure Functions)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type BuildOptions,
	createDefaultOptions,
	DEFAULT_SCRIPT_PATH,
	type ExitCode,
	getArgument,
	ScriptPath,
	type Verbosity,
	VERBOSITY_LEVELS,
} from "./core/models.js";

export { type ParserSettings, parseArguments } from "./core/args/parser.js";
export {
	classifyOption,
	type OptionKind,
	RECOGNIZED_OPTIONS,
} from "./core/args/option-kind.js";
export { parseBooleanValue } from "./core/args/boolean.js";
export { unquote } from "./core/args/quote.js";
export { isOptionToken, splitOption } from "./core/args/token.js";
export {
	defaultVerbosityResolver,
	tryParseVerbosity,
	type VerbosityResolver,
} from "./core/verbosity.js";
export {
	type LauncherCommand,
	type ScriptCommand,
	selectCommand,
} from "./core/decision.js";
export {
	ConfigError,
	DuplicateArgument,
	InvalidBooleanValue,
	InvalidInput,
	InvalidVerbosity,
	MultipleScriptsSpecified,
	ParseFailure,
	type UsageError,
} from "./core/errors.js";
export { describeCommand, formatUsageError } from "./core/format/messages.js";
export { formatUsage } from "./core/format/usage.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Facades with IO)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ArgumentParser,
	createArgumentParser,
	parseArgumentsEffect,
} from "./shell/args/argument-parser.js";
export {
	createConsoleSink,
	type DiagnosticSink,
} from "./shell/diagnostics/sink.js";
export {
	type LauncherConfig,
	loadLauncherConfig,
} from "./shell/config/loader.js";
