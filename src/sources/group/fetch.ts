import { type Dispatcher, fetch, ProxyAgent } from "undici";
import type { FetchOptions, PageFetcher } from "./types.js";

const ACCEPT_LANGUAGE = "en-US,en;q=0.9";

/**
 * URL of the n-th feed page. Page 1 is the group URL itself.
 */
export function buildPageUrl(groupUrl: string, page: number): string {
	if (page <= 1) return groupUrl;
	const separator = groupUrl.includes("?") ? "&" : "?";
	return `${groupUrl}${separator}page=${page}`;
}

export function buildHeaders(options: FetchOptions): Record<string, string> {
	const headers: Record<string, string> = {
		"User-Agent": options.userAgent,
		"Accept-Language": ACCEPT_LANGUAGE,
	};
	if (options.sessionCookie) {
		headers.Cookie = options.sessionCookie;
	}
	return headers;
}

/** Connection pool routing requests through the configured proxy, if any. */
export function createDispatcher(proxy?: string): Dispatcher | undefined {
	return proxy ? new ProxyAgent(proxy) : undefined;
}

export async function fetchGroupPage(
	groupUrl: string,
	page: number,
	options: FetchOptions,
	dispatcher: Dispatcher | undefined = createDispatcher(options.proxy),
): Promise<string> {
	const response = await fetch(buildPageUrl(groupUrl, page), {
		headers: buildHeaders(options),
		signal: AbortSignal.timeout(options.requestTimeoutMs),
		dispatcher,
	});

	if (!response.ok) {
		throw new Error(
			`Group page request failed: ${response.status} ${response.statusText}`,
		);
	}

	return response.text();
}

export function createPageFetcher(options: FetchOptions): PageFetcher {
	const dispatcher = createDispatcher(options.proxy);
	return (groupUrl, page) =>
		fetchGroupPage(groupUrl, page, options, dispatcher);
}
