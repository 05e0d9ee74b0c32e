import {
	type Config,
	DEFAULT_CONFIG_PATH,
	hasSessionCookie,
	loadConfig,
	loadGroupUrls,
} from "../../config.js";
import { PostExtractor } from "../../extract/extractor.js";
import type { Post } from "../../extract/types.js";
import { exportPosts } from "../../outputs/exporter.js";
import { createPageFetcher } from "../../sources/group/fetch.js";
import { scrapeGroup } from "../../sources/group/index.js";
import { parseFormats } from "../flags.js";
import {
	createDiagnosticSink,
	describeError,
	levelForVerbosity,
	log,
	logGroupComplete,
	logGroupStart,
	setLogLevel,
} from "../../ui/logger.js";

interface ScrapeCommandFlags {
	config?: string;
	input?: string;
	maxPosts?: number;
	outputDir?: string;
	formats?: string;
	verbose: number;
}

async function resolveGroups(
	config: Config,
	inputPath?: string,
): Promise<string[]> {
	const fromFile = inputPath ? await loadGroupUrls(inputPath) : [];
	return [...new Set([...config.groups, ...fromFile])];
}

export async function scrape(flags: ScrapeCommandFlags): Promise<void> {
	setLogLevel(levelForVerbosity(flags.verbose));

	const config = await loadConfig(flags.config ?? DEFAULT_CONFIG_PATH);
	const formats = flags.formats
		? parseFormats(flags.formats)
		: config.output.formats;
	const groups = await resolveGroups(config, flags.input);
	if (groups.length === 0) {
		log.warn("No groups configured, nothing to scrape");
		return;
	}

	if (!hasSessionCookie(config)) {
		log.warn(
			"Session cookie is not configured; set 'sessionCookie' in the config file",
		);
	}

	const fetchPage = createPageFetcher({
		sessionCookie: config.sessionCookie,
		userAgent: config.userAgent,
		requestTimeoutMs: config.requestTimeoutMs,
		proxy: config.proxy,
	});

	const posts: Post[] = [];
	const failed: string[] = [];

	for (const groupUrl of groups) {
		logGroupStart(groupUrl);
		try {
			const result = await scrapeGroup({
				groupUrl,
				fetchPage,
				extractor: new PostExtractor({
					origin: config.siteOrigin,
					report: createDiagnosticSink({ group: groupUrl }),
				}),
				maxPosts: flags.maxPosts ?? config.maxPostsPerGroup,
				paginationLimit: config.paginationLimit,
				sleepBetweenRequestsMs: config.sleepBetweenRequestsMs,
			});
			posts.push(...result.posts);
			logGroupComplete(groupUrl, result.posts.length);
		} catch (error) {
			failed.push(groupUrl);
			log.error(`Failed to scrape group (${describeError(error)})`, {
				group: groupUrl,
			});
		}
	}

	if (posts.length === 0) {
		log.warn("No posts were scraped. Nothing to export.");
	} else {
		await exportPosts({
			posts,
			outputDir: flags.outputDir ?? config.output.dir,
			baseFilename: config.output.baseFilename,
			formats,
		});
	}

	if (failed.length > 0) {
		throw new Error(
			`Scraping completed with ${failed.length} failed group(s) out of ${groups.length}`,
		);
	}

	log.info("Scraping and export complete");
}
