import { buildCommand } from "@stricli/core";
import { outputFlags, parsePositiveInt } from "../flags.js";

export const scrapeCommand = buildCommand({
	loader: async () => {
		const { scrape } = await import("./impl.js");
		return scrape;
	},
	parameters: {
		flags: {
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Path to the YAML configuration file (default: ./config.yaml)",
			},
			input: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief:
					"Text file with one group URL per line, added to the configured groups",
			},
			maxPosts: {
				kind: "parsed",
				parse: parsePositiveInt,
				optional: true,
				brief: "Maximum number of posts per group (overrides config)",
			},
			...outputFlags,
		},
		aliases: {
			c: "config",
			v: "verbose",
		},
	},
	docs: {
		brief: "Fetch group feeds and export the extracted posts",
		fullDescription:
			"Fetches each configured group page by page, extracts posts from the HTML and writes them to the configured output formats.",
	},
});
