import { setTimeout as sleep } from "node:timers/promises";
import { describeError, log, logPageResult } from "../../ui/logger.js";
import type { Post } from "../../extract/types.js";
import type {
	GroupPage,
	GroupRunResult,
	ScrapeGroupArgs,
} from "./types.js";

/**
 * Async generator over the feed pages of one group. Stops at the pagination
 * limit, at the first page without posts, or when a request fails.
 */
export async function* listGroupPages(
	args: Omit<ScrapeGroupArgs, "maxPosts">,
): AsyncGenerator<GroupPage, GroupRunResult["stopReason"]> {
	const { groupUrl, fetchPage, extractor, paginationLimit } = args;

	for (let page = 1; page <= paginationLimit; page++) {
		if (page > 1) {
			// Be nice to the site
			await sleep(args.sleepBetweenRequestsMs);
		}

		let html: string;
		try {
			html = await fetchPage(groupUrl, page);
		} catch (error) {
			log.warn(`Failed to fetch page (${describeError(error)})`, {
				group: groupUrl,
				page,
			});
			return "fetch-failed";
		}

		const posts = extractor.extract(html, groupUrl);
		if (posts.length === 0) {
			return "empty-page";
		}

		yield { page, posts };
	}

	return "pagination-limit";
}

/**
 * Collect up to `maxPosts` posts from a group, page by page.
 */
export async function scrapeGroup(
	args: ScrapeGroupArgs,
): Promise<GroupRunResult> {
	const { groupUrl, maxPosts } = args;
	const posts: Post[] = [];
	let pagesFetched = 0;

	const pages = listGroupPages(args);
	while (true) {
		const next = await pages.next();
		if (next.done) {
			return { groupUrl, posts, pagesFetched, stopReason: next.value };
		}

		pagesFetched += 1;
		posts.push(...next.value.posts);
		logPageResult(groupUrl, next.value.page, next.value.posts.length, posts.length);

		if (posts.length >= maxPosts) {
			await pages.return("max-posts");
			return {
				groupUrl,
				posts: posts.slice(0, maxPosts),
				pagesFetched,
				stopReason: "max-posts",
			};
		}
	}
}
