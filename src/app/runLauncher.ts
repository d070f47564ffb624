// CHANGE: Application layer composing config, parser, command selection and engine
// WHY: The binary and library callers share one pipeline that returns the exit code as a value
// PURITY: APP (no process.exit; IO only through injected services)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every failure is reported once and mapped to exit code 1
// COMPLEXITY: O(n·k) dominated by argument parsing

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	computeExitCode,
	type LauncherCommand,
	type ScriptCommand,
	selectCommand,
} from "../core/decision.js";
import type { ConfigError } from "../core/errors.js";
import { describeCommand } from "../core/format/messages.js";
import { formatUsage } from "../core/format/usage.js";
import type { ExitCode } from "../core/models.js";
import { defaultVerbosityResolver } from "../core/verbosity.js";
import {
	parseArgumentsEffect,
	reportParseFailure,
} from "../shell/args/argument-parser.js";
import {
	type LauncherConfig,
	loadLauncherConfig,
} from "../shell/config/loader.js";
import {
	createConsoleOutput,
	createConsoleSink,
	type DiagnosticSink,
	type OutputLine,
} from "../shell/diagnostics/sink.js";

export const VERSION = "0.1.0";

export const PROGRAM_NAME = "build-launcher";

/**
 * Runs a selected script command. Script execution itself lives outside
 * this package; the engine decides what "run" means.
 */
export interface BuildEngine {
	readonly run: (command: ScriptCommand) => Effect.Effect<ExitCode>;
}

export interface LauncherServices {
	readonly sink: DiagnosticSink;
	readonly output: OutputLine;
	readonly engine: BuildEngine;
	readonly loadConfig: () => Effect.Effect<LauncherConfig, ConfigError>;
}

/**
 * Engine that prints the command summary and succeeds.
 *
 * @pure false (console output)
 */
export function createPrintingEngine(output: OutputLine): BuildEngine {
	return {
		run: (command) =>
			Effect.sync((): ExitCode => {
				output(describeCommand(command));
				return 0;
			}),
	};
}

export function createDefaultServices(): LauncherServices {
	const output = createConsoleOutput();
	return {
		sink: createConsoleSink(),
		output,
		engine: createPrintingEngine(output),
		loadConfig: () => loadLauncherConfig(),
	};
}

const printUsage = (output: OutputLine): void => {
	for (const line of formatUsage(PROGRAM_NAME)) {
		output(line);
	}
};

function runCommand(
	command: LauncherCommand,
	services: LauncherServices,
): Effect.Effect<ExitCode> {
	return match(command)
		.with({ _tag: "Usage" }, () =>
			Effect.sync((): ExitCode => {
				printUsage(services.output);
				return 1;
			}),
		)
		.with({ _tag: "Help" }, () =>
			Effect.sync((): ExitCode => {
				printUsage(services.output);
				return 0;
			}),
		)
		.with({ _tag: "Version" }, () =>
			Effect.sync((): ExitCode => {
				services.output(`${PROGRAM_NAME} ${VERSION}`);
				return 0;
			}),
		)
		.with({ _tag: "Script" }, (script) => services.engine.run(script))
		.exhaustive();
}

function executeCommand(
	command: LauncherCommand,
	services: LauncherServices,
): Effect.Effect<ExitCode> {
	return runCommand(command, services).pipe(
		Effect.map((code) => computeExitCode(command, code)),
	);
}

/**
 * Launcher pipeline for programmatic use.
 *
 * @param argv Arguments after the node executable and entry script
 *
 * @pure false (coordinates effects), but never terminates the process
 * @effect Effect<ExitCode, never> — usage errors, config errors and the
 *   invalid-boolean fault are reported through the sink and become 1
 * @invariant ExitCode ∈ {0,1}
 */
export function runLauncherEffect(
	argv: readonly string[],
	services: LauncherServices,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const config = yield* services.loadConfig();
		const options = yield* parseArgumentsEffect(argv, {
			resolver: defaultVerbosityResolver,
			defaultScript: config.defaultScript,
		});
		return yield* executeCommand(selectCommand(options), services);
	}).pipe(
		Effect.catchTags({
			ConfigError: (error) =>
				Effect.sync((): ExitCode => {
					services.sink.error(
						`Could not load ${error.path}: ${error.detail}`,
					);
					return 1;
				}),
			ParseFailure: (failure) =>
				Effect.suspend(() => {
					reportParseFailure(failure, services.sink);
					return executeCommand(selectCommand(failure.options), services);
				}),
			InvalidBooleanValue: (fault) =>
				Effect.sync((): ExitCode => {
					services.sink.error(fault.message);
					return 1;
				}),
		}),
	);
}

/**
 * Promise-returning entry used by the binary and by library consumers.
 *
 * @example
 * ```ts
 * const exitCode = await runLauncher(["build.cake", "--target=Pack"]);
 * ```
 */
export function runLauncher(
	argv: readonly string[],
	services: LauncherServices = createDefaultServices(),
): Promise<ExitCode> {
	return Effect.runPromise(runLauncherEffect(argv, services));
}
