import { buildCommand } from "@stricli/core";
import { outputFlags } from "../flags.js";

export const parseCommand = buildCommand({
	loader: async () => {
		const { parse } = await import("./impl.js");
		return parse;
	},
	parameters: {
		flags: {
			url: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Page URL used for posts without a permalink",
			},
			origin: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Site origin relative links are resolved against",
			},
			baseFilename: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "File name (without extension) of the exported files",
			},
			...outputFlags,
		},
		positional: {
			kind: "array",
			parameter: {
				brief: "Saved HTML pages of a group feed",
				parse: String,
				placeholder: "file",
			},
			minimum: 1,
		},
		aliases: {
			v: "verbose",
		},
	},
	docs: {
		brief: "Extract posts from saved feed HTML files",
		fullDescription:
			"Runs the post extractor over local HTML files without any network access and exports the result.",
	},
});
