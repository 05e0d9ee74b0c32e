import { describe, expect, it, vi } from "vitest";
import { PostExtractor } from "../../extract/extractor.js";
import { scrapeGroup } from "./index.js";
import type { PageFetcher } from "./types.js";

vi.mock("../../ui/logger.js", () => ({
	log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
	describeError: (error: unknown) =>
		error instanceof Error ? error.message : String(error),
	logPageResult: vi.fn(),
}));

const GROUP_URL = "https://www.facebook.com/groups/1";

function feedPage(...texts: string[]): string {
	return texts
		.map((text) => `<div role="article"><div dir="auto">${text}</div></div>`)
		.join("");
}

function fakeFetcher(pages: Record<number, string | Error>): PageFetcher {
	return vi.fn(async (_groupUrl: string, page: number) => {
		const result = pages[page];
		if (result instanceof Error) throw result;
		return result ?? "";
	});
}

function run(fetchPage: PageFetcher, maxPosts = 100, paginationLimit = 10) {
	return scrapeGroup({
		groupUrl: GROUP_URL,
		fetchPage,
		extractor: new PostExtractor({ clock: () => 0 }),
		maxPosts,
		paginationLimit,
		sleepBetweenRequestsMs: 0,
	});
}

describe("scrapeGroup", () => {
	it("stops at the first empty page", async () => {
		const fetchPage = fakeFetcher({
			1: feedPage("a", "b"),
			2: feedPage("c"),
			3: "<html></html>",
		});

		const result = await run(fetchPage);

		expect(result.posts.map((post) => post.text)).toEqual(["a", "b", "c"]);
		expect(result.pagesFetched).toBe(2);
		expect(result.stopReason).toBe("empty-page");
		expect(fetchPage).toHaveBeenCalledTimes(3);
	});

	it("truncates to the post limit and stops requesting pages", async () => {
		const fetchPage = fakeFetcher({
			1: feedPage("a", "b"),
			2: feedPage("c", "d"),
			3: feedPage("e"),
		});

		const result = await run(fetchPage, 3);

		expect(result.posts.map((post) => post.text)).toEqual(["a", "b", "c"]);
		expect(result.stopReason).toBe("max-posts");
		expect(fetchPage).toHaveBeenCalledTimes(2);
	});

	it("respects the pagination limit", async () => {
		const fetchPage = fakeFetcher({
			1: feedPage("a"),
			2: feedPage("b"),
			3: feedPage("c"),
		});

		const result = await run(fetchPage, 100, 2);

		expect(result.posts).toHaveLength(2);
		expect(result.stopReason).toBe("pagination-limit");
		expect(fetchPage).toHaveBeenCalledTimes(2);
	});

	it("keeps earlier pages when a request fails", async () => {
		const fetchPage = fakeFetcher({
			1: feedPage("a"),
			2: new Error("timeout"),
		});

		const result = await run(fetchPage);

		expect(result.posts.map((post) => post.text)).toEqual(["a"]);
		expect(result.pagesFetched).toBe(1);
		expect(result.stopReason).toBe("fetch-failed");
	});

	it("requests pages with the group URL and page number", async () => {
		const fetchPage = fakeFetcher({ 1: feedPage("a") });
		await run(fetchPage);
		expect(fetchPage).toHaveBeenNthCalledWith(1, GROUP_URL, 1);
		expect(fetchPage).toHaveBeenNthCalledWith(2, GROUP_URL, 2);
	});
});
