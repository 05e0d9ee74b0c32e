export const DEFAULT_SITE_ORIGIN = "https://www.facebook.com";

const ABSOLUTE_URL = /^https?:\/\//i;
const NUMERIC_ID_PARAM = /[?&]id=(\d+)/;

/**
 * Resolve an href found in feed markup against the site origin.
 */
export function normalizeUrl(
	href: string,
	origin: string = DEFAULT_SITE_ORIGIN,
): string {
	const value = href.trim();
	if (ABSOLUTE_URL.test(value)) return value;
	if (value.startsWith("//")) return `https:${value}`;
	if (value.startsWith("/")) return `${origin}${value}`;
	return `${origin}/${value.replace(/^[./]+/, "")}`;
}

export function isSiteUrl(
	url: string,
	origin: string = DEFAULT_SITE_ORIGIN,
): boolean {
	const host = hostnameOf(url);
	const siteHost = hostnameOf(origin);
	if (!host || !siteHost) return false;

	// Subdomains such as m. or web. belong to the site as well
	const site = bareHost(siteHost);
	return host === site || host.endsWith(`.${site}`);
}

/**
 * Best-effort user id from a profile URL: the numeric `id` query parameter
 * when present, otherwise the last path segment. Off-site URLs yield "".
 */
export function deriveUserId(
	profileUrl: string,
	origin: string = DEFAULT_SITE_ORIGIN,
): string {
	if (!profileUrl || !isSiteUrl(profileUrl, origin)) return "";

	const numeric = NUMERIC_ID_PARAM.exec(profileUrl);
	if (numeric?.[1]) return numeric[1];

	let pathname: string;
	try {
		pathname = new URL(profileUrl).pathname;
	} catch {
		return "";
	}
	const segments = pathname.split("/").filter((segment) => segment !== "");
	return segments.at(-1) ?? "";
}

function hostnameOf(url: string): string | null {
	try {
		return new URL(url).hostname.toLowerCase();
	} catch {
		return null;
	}
}

function bareHost(host: string): string {
	return host.replace(/^www\./, "");
}
