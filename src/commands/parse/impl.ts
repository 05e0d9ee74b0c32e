import { readFile } from "node:fs/promises";
import path from "node:path";
import { PostExtractor } from "../../extract/extractor.js";
import type { Post } from "../../extract/types.js";
import { DEFAULT_SITE_ORIGIN } from "../../extract/url.js";
import { exportPosts } from "../../outputs/exporter.js";
import {
	createDiagnosticSink,
	levelForVerbosity,
	log,
	setLogLevel,
} from "../../ui/logger.js";
import { parseFormats } from "../flags.js";

interface ParseCommandFlags {
	url?: string;
	origin?: string;
	baseFilename?: string;
	outputDir?: string;
	formats?: string;
	verbose: number;
}

export async function parse(
	flags: ParseCommandFlags,
	...files: string[]
): Promise<void> {
	setLogLevel(levelForVerbosity(flags.verbose));

	const formats = parseFormats(flags.formats ?? "json");
	const origin = flags.origin ?? DEFAULT_SITE_ORIGIN;
	const posts: Post[] = [];

	for (const file of files) {
		const html = await readFile(file, "utf8");
		const extractor = new PostExtractor({
			origin,
			report: createDiagnosticSink({ group: path.basename(file) }),
		});
		const found = extractor.extract(html, flags.url ?? origin);
		log.info(`found ${found.length} posts`, { group: path.basename(file) });
		posts.push(...found);
	}

	await exportPosts({
		posts,
		outputDir: flags.outputDir ?? ".",
		baseFilename: flags.baseFilename ?? "parsed_posts",
		formats,
	});
}
