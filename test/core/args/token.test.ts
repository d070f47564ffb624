import { describe, expect, it } from "vitest";

import { isOptionToken, splitOption } from "../../../src/core/args/token.js";

describe("isOptionToken", () => {
	it("accepts one or two leading dashes", () => {
		expect(isOptionToken("-v")).toBe(true);
		expect(isOptionToken("--verbosity=Quiet")).toBe(true);
		expect(isOptionToken("-")).toBe(true);
	});

	it("rejects empty, whitespace-only and bare tokens", () => {
		expect(isOptionToken("")).toBe(false);
		expect(isOptionToken("   ")).toBe(false);
		expect(isOptionToken("build.cake")).toBe(false);
		expect(isOptionToken(" -v")).toBe(false);
	});
});

describe("splitOption", () => {
	it("returns an empty value when there is no separator", () => {
		expect(splitOption("--debug")).toEqual({ name: "debug", value: "" });
		expect(splitOption("-d")).toEqual({ name: "d", value: "" });
	});

	it("splits on the first '=' only", () => {
		expect(splitOption("--define=a=b")).toEqual({ name: "define", value: "a=b" });
	});

	it("unquotes the value once", () => {
		expect(splitOption("-target='Pack'")).toEqual({ name: "target", value: "Pack" });
		expect(splitOption('--x=""y""')).toEqual({ name: "x", value: '"y"' });
	});

	it("keeps a third dash as part of the name", () => {
		expect(splitOption("---odd")).toEqual({ name: "-odd", value: "" });
	});

	it("allows an empty name", () => {
		expect(splitOption("--=value")).toEqual({ name: "", value: "value" });
	});
});
