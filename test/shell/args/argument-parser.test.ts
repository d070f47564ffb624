// CHANGE: Tests for the parser facade and its sink reporting
// INVARIANT: Usage errors reach the sink in detection order; faults never do

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { InvalidBooleanValue, InvalidInput } from "../../../src/core/errors.js";
import { ScriptPath } from "../../../src/core/models.js";
import { defaultVerbosityResolver } from "../../../src/core/verbosity.js";
import {
	createArgumentParser,
	parseArgumentsEffect,
} from "../../../src/shell/args/argument-parser.js";
import type { DiagnosticSink } from "../../../src/shell/diagnostics/sink.js";
import { resolverOf } from "../../utils/builders.js";

const recordingSink = (): { sink: DiagnosticSink; messages: string[] } => {
	const messages: string[] = [];
	return { sink: { error: (message) => messages.push(message) }, messages };
};

describe("createArgumentParser", () => {
	it("returns options without diagnostics on success", (): void => {
		const { sink, messages } = recordingSink();
		const options = createArgumentParser({ sink }).parse([
			"build.cake",
			"--target=Pack",
		]);
		expect(options.hasError).toBe(false);
		expect(options.script).toBe("build.cake");
		expect(messages).toEqual([]);
	});

	it("reports an extra script argument and returns the partial record", (): void => {
		const { sink, messages } = recordingSink();
		const options = createArgumentParser({ sink }).parse(["a.cake", "b.cake"]);
		expect(options.hasError).toBe(true);
		expect(options.script).toBe("a.cake");
		expect(messages).toEqual(["More than one build script specified."]);
	});

	it("reports an unknown verbosity", (): void => {
		const { sink, messages } = recordingSink();
		const options = createArgumentParser({ sink }).parse(["--verbosity=bogus"]);
		expect(options.hasError).toBe(true);
		expect(options.verbosity).toBe("Normal");
		expect(messages).toEqual(["The value 'bogus' is not a valid verbosity."]);
	});

	it("reports every usage error in order", (): void => {
		const { sink, messages } = recordingSink();
		createArgumentParser({ sink }).parse(["-v=loud", "--debug", "--Debug"]);
		expect(messages).toEqual([
			"The value 'loud' is not a valid verbosity.",
			"Multiple arguments with the same name (Debug).",
		]);
	});

	it("lets the invalid-boolean fault propagate without reporting it", (): void => {
		const { sink, messages } = recordingSink();
		const parser = createArgumentParser({ sink });
		expect(() => parser.parse(["--dryrun=notabool"])).toThrow(
			InvalidBooleanValue,
		);
		expect(messages).toEqual([]);
	});

	it("rejects a missing sequence", (): void => {
		const { sink } = recordingSink();
		expect(() => createArgumentParser({ sink }).parse(undefined)).toThrow(
			InvalidInput,
		);
	});

	it("uses the injected resolver and default script", (): void => {
		const { sink } = recordingSink();
		const options = createArgumentParser({
			sink,
			resolver: resolverOf({ chatty: "Verbose" }),
			defaultScript: ScriptPath("./tools/build.cake"),
		}).parse(["--verbosity=chatty"]);
		expect(options.verbosity).toBe("Verbose");
		expect(options.script).toBe("./tools/build.cake");
	});
});

describe("parseArgumentsEffect", () => {
	const settings = { resolver: defaultVerbosityResolver };
	const run = (args: readonly string[]) =>
		Effect.runSync(Effect.either(parseArgumentsEffect(args, settings)));

	it("succeeds with the options", (): void => {
		const result = run(["--mono"]);
		expect(Either.isRight(result)).toBe(true);
		if (Either.isRight(result)) {
			expect(result.right.mono).toBe(true);
		}
	});

	it("fails with ParseFailure for usage errors", (): void => {
		const result = run(["a.cake", "b.cake"]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ParseFailure");
		}
	});

	it("moves the invalid-boolean fault onto the error channel", (): void => {
		const result = run(["--mono=maybe"]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("InvalidBooleanValue");
		}
	});
});
