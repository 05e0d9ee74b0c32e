import type { PostExtractor } from "../../extract/extractor.js";
import type { Post } from "../../extract/types.js";

export type FetchOptions = {
	sessionCookie: string;
	userAgent: string;
	requestTimeoutMs: number;
	/** Proxy URL every request is sent through */
	proxy?: string;
};

/** Returns the HTML of one page of a group feed. */
export type PageFetcher = (groupUrl: string, page: number) => Promise<string>;

export type ScrapeGroupArgs = {
	groupUrl: string;
	fetchPage: PageFetcher;
	extractor: PostExtractor;
	maxPosts: number;
	paginationLimit: number;
	sleepBetweenRequestsMs: number;
};

export type GroupPage = {
	page: number;
	posts: Post[];
};

export type GroupRunResult = {
	groupUrl: string;
	posts: Post[];
	pagesFetched: number;
	stopReason: "max-posts" | "pagination-limit" | "empty-page" | "fetch-failed";
};
