import { type OutputFormat, outputFormatSchema } from "../config.js";

export function parsePositiveInt(input: string): number {
	const value = Number(input);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`Expected a positive integer, got '${input}'`);
	}
	return value;
}

/** "json, csv" -> ["json", "csv"] */
export function parseFormats(input: string): OutputFormat[] {
	const formats = input
		.split(",")
		.map((part) => part.trim().toLowerCase())
		.filter((part) => part !== "");
	if (formats.length === 0) {
		throw new Error("Expected at least one output format");
	}
	return formats.map((format) => outputFormatSchema.parse(format));
}

export const outputFlags = {
	outputDir: {
		kind: "parsed",
		parse: String,
		optional: true,
		brief: "Directory exported files are written to",
	},
	formats: {
		kind: "parsed",
		parse: String,
		optional: true,
		brief: "Comma-separated output formats: json,csv,xlsx",
	},
	verbose: {
		kind: "counter",
		brief: "Log extraction details (repeatable)",
	},
} as const;
