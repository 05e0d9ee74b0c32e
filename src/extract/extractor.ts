import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { resolveField, type Strategy, valueOr } from "./cascade.js";
import { commentStrategies } from "./comments.js";
import {
	attachmentStrategies,
	authorStrategies,
	engagementStrategies,
	permalinkStrategies,
	textStrategies,
	timestampStrategies,
} from "./fields.js";
import type { ContainerScope } from "./scope.js";
import { type DiagnosticSink, EMPTY_USER, type Post } from "./types.js";
import { DEFAULT_SITE_ORIGIN } from "./url.js";

const ARTICLE_CONTAINERS = "div[role='article']";
const LEGACY_CONTAINERS = "div[aria-posinset], div.story_body_container";

export type PostExtractorOptions = {
	/** Origin relative links are resolved against */
	origin?: string;
	/** Receives debug diagnostics for skipped fields, comments and containers */
	report?: DiagnosticSink;
	/** Epoch milliseconds used as "now"; defaults to the wall clock */
	clock?: () => number;
};

const ignoreDiagnostics: DiagnosticSink = () => {};

/**
 * Post containers in document order: elements with the article role, or the
 * legacy feed-item containers when the page has none.
 */
export function findPostContainers($: CheerioAPI): Element[] {
	const articles = $(ARTICLE_CONTAINERS).toArray();
	if (articles.length > 0) return articles;
	return $(LEGACY_CONTAINERS).toArray();
}

export class PostExtractor {
	private readonly origin: string;
	private readonly report: DiagnosticSink;
	private readonly clock: () => number;

	constructor(options: PostExtractorOptions = {}) {
		this.origin = options.origin ?? DEFAULT_SITE_ORIGIN;
		this.report = options.report ?? ignoreDiagnostics;
		this.clock = options.clock ?? Date.now;
	}

	/**
	 * Extract every post on one feed page. A container that cannot be read is
	 * reported and skipped; this method does not throw.
	 */
	extract(html: string, fallbackUrl: string): Post[] {
		let $: CheerioAPI;
		try {
			$ = cheerio.load(html);
		} catch (error) {
			this.report({ level: "debug", message: "Unparseable document", error });
			return [];
		}

		const nowMs = this.clock();
		const posts: Post[] = [];

		findPostContainers($).forEach((container, index) => {
			try {
				posts.push(
					this.extractPost({
						$,
						container,
						fallbackUrl,
						origin: this.origin,
						nowMs,
						report: (diagnostic) =>
							this.report({ ...diagnostic, container: index }),
					}),
				);
			} catch (error) {
				this.report({
					level: "debug",
					message: `Failed to parse post container #${index}`,
					container: index,
					error,
				});
			}
		});

		return posts;
	}

	private extractPost(scope: ContainerScope): Post {
		const field = <T>(
			name: string,
			strategies: ReadonlyArray<Strategy<ContainerScope, T>>,
			fallback: T,
		): T => valueOr(resolveField(name, strategies, scope, scope.report), fallback);

		return {
			createdAt: field("createdAt", timestampStrategies, 0),
			url: field("url", permalinkStrategies, scope.fallbackUrl || this.origin),
			user: field("user", authorStrategies, EMPTY_USER),
			text: field("text", textStrategies, ""),
			attachments: field("attachments", attachmentStrategies, []),
			reactionCount: field("reactionCount", engagementStrategies("reactions"), 0),
			shareCount: field("shareCount", engagementStrategies("shares"), 0),
			commentCount: field("commentCount", engagementStrategies("comments"), 0),
			topComments: field("topComments", commentStrategies, []),
		};
	}
}

export function extractPosts(
	html: string,
	fallbackUrl: string,
	options?: PostExtractorOptions,
): Post[] {
	return new PostExtractor(options).extract(html, fallbackUrl);
}
