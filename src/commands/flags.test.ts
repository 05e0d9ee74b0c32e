import { describe, expect, it } from "vitest";
import { parseFormats, parsePositiveInt } from "./flags.js";

describe("parsePositiveInt", () => {
	it("accepts positive integers", () => {
		expect(parsePositiveInt("25")).toBe(25);
	});

	it("rejects zero, negatives, fractions and words", () => {
		for (const input of ["0", "-3", "1.5", "ten"]) {
			expect(() => parsePositiveInt(input)).toThrow(
				`Expected a positive integer, got '${input}'`,
			);
		}
	});
});

describe("parseFormats", () => {
	it("splits, trims and lowercases", () => {
		expect(parseFormats(" JSON, csv ,")).toEqual(["json", "csv"]);
	});

	it("rejects unknown formats", () => {
		expect(() => parseFormats("json,pdf")).toThrow();
	});

	it("rejects an empty list", () => {
		expect(() => parseFormats(" , ")).toThrow("Expected at least one output format");
	});
});
