import { describe, expect, it } from "vitest";

import { parseBooleanValue } from "../../../src/core/args/boolean.js";
import { InvalidBooleanValue } from "../../../src/core/errors.js";

describe("parseBooleanValue", () => {
	it("treats a bare flag as true", () => {
		expect(parseBooleanValue("debug", "")).toBe(true);
		expect(parseBooleanValue("debug", "  ")).toBe(true);
	});

	it("reads true and false ignoring case", () => {
		expect(parseBooleanValue("mono", "TRUE")).toBe(true);
		expect(parseBooleanValue("mono", "False")).toBe(false);
	});

	it("throws InvalidBooleanValue for any other literal", () => {
		expect(() => parseBooleanValue("dryrun", "yes")).toThrow(InvalidBooleanValue);
		expect(() => parseBooleanValue("dryrun", "1")).toThrow(
			"Argument value '1' of option 'dryrun' is not a valid boolean value.",
		);
	});

	it("does not unquote the value a second time", () => {
		expect(() => parseBooleanValue("help", '"true"')).toThrow(InvalidBooleanValue);
	});

	it("carries the option name and value on the fault", () => {
		try {
			parseBooleanValue("bootstrap", "maybe");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidBooleanValue);
			if (error instanceof InvalidBooleanValue) {
				expect(error._tag).toBe("InvalidBooleanValue");
				expect(error.option).toBe("bootstrap");
				expect(error.value).toBe("maybe");
			}
		}
	});
});
