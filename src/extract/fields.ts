import type { Element } from "domhandler";
import type { Strategy } from "./cascade.js";
import { anchorText, anchorsWithHref, visibleText } from "./dom.js";
import type { ContainerScope } from "./scope.js";
import { normalizeTimestamp } from "./time.js";
import type { Attachment, User } from "./types.js";
import { deriveUserId, isSiteUrl, normalizeUrl } from "./url.js";

type FieldStrategies<T> = ReadonlyArray<Strategy<ContainerScope, T>>;

// ── Permalink ──────────────────────────────────────────────────────────

const COMMENT_ACTION_LABEL = "Comment";

export const permalinkStrategies: FieldStrategies<string> = [
	{
		name: "permalink-anchor",
		attempt: ({ $, container, origin }) => {
			for (const anchor of anchorsWithHref($, container).toArray()) {
				const href = $(anchor).attr("href") ?? "";
				const text = anchorText($, anchor);
				if (
					href.includes("permalink") &&
					text &&
					!text.includes(COMMENT_ACTION_LABEL)
				) {
					return normalizeUrl(href, origin);
				}
			}
			return null;
		},
	},
	{
		name: "post-path-anchor",
		attempt: ({ $, container, origin }) => {
			for (const anchor of anchorsWithHref($, container).toArray()) {
				const href = $(anchor).attr("href") ?? "";
				if (href.includes("/posts/") || href.includes("/permalink/")) {
					return normalizeUrl(href, origin);
				}
			}
			return null;
		},
	},
	{
		name: "fallback-url",
		attempt: ({ fallbackUrl }) => fallbackUrl || null,
	},
];

// ── Author ─────────────────────────────────────────────────────────────

function userFromAnchor(
	scope: ContainerScope,
	anchor: Element,
	name: string,
): User {
	const url = normalizeUrl(scope.$(anchor).attr("href") ?? "", scope.origin);
	return { id: deriveUserId(url, scope.origin), name, url };
}

export function findProfileAnchor(
	scope: ContainerScope,
	root: Element,
): User | null {
	const { $ } = scope;
	for (const anchor of anchorsWithHref($, root).toArray()) {
		const $anchor = $(anchor);
		const focusable =
			$anchor.attr("role") === "link" ||
			$anchor.attr("tabindex") !== undefined;
		if (!focusable) continue;

		const name = anchorText($, anchor);
		if (name) return userFromAnchor(scope, anchor, name);
	}
	return null;
}

export const authorStrategies: FieldStrategies<User> = [
	{
		name: "focusable-profile-anchor",
		attempt: (scope) => findProfileAnchor(scope, scope.container),
	},
];

// ── Text ───────────────────────────────────────────────────────────────

export const textStrategies: FieldStrategies<string> = [
	{
		name: "auto-direction-blocks",
		attempt: ({ $, container }) => {
			const texts = $(container)
				.find("div[dir='auto'], span[dir='auto']")
				.toArray()
				.map((block) => visibleText(block))
				.filter((text) => text !== "");
			return texts.length > 0 ? texts.join(" ") : null;
		},
	},
	{
		name: "container-text",
		attempt: ({ container }) => visibleText(container),
	},
];

// ── Attachments ────────────────────────────────────────────────────────

export function dedupeAttachments(
	attachments: readonly Attachment[],
): Attachment[] {
	const seen = new Set<string>();
	const unique: Attachment[] = [];
	for (const attachment of attachments) {
		const key = `${attachment.type}\u0000${attachment.url}`;
		if (seen.has(key)) continue;
		seen.add(key);
		unique.push(attachment);
	}
	return unique;
}

export const attachmentStrategies: FieldStrategies<Attachment[]> = [
	{
		name: "images-and-external-links",
		attempt: ({ $, container, origin }) => {
			const attachments: Attachment[] = [];

			for (const image of $(container).find("img").toArray()) {
				const src = $(image).attr("src");
				if (!src) continue;
				attachments.push({
					type: "image",
					url: src,
					alt: $(image).attr("alt") ?? "",
				});
			}

			for (const anchor of anchorsWithHref($, container).toArray()) {
				const href = $(anchor).attr("href") ?? "";
				if (!href.trim()) continue;
				if (href.toLowerCase().includes("comment")) continue;

				const url = normalizeUrl(href, origin);
				// Profile, group and post links on the site itself are not attachments
				if (isSiteUrl(url, origin)) continue;

				attachments.push({ type: "link", url, text: anchorText($, anchor) });
			}

			return dedupeAttachments(attachments);
		},
	},
];

// ── Engagement ─────────────────────────────────────────────────────────

export type EngagementLabel = "reactions" | "comments" | "shares";

const INTEGER_TOKEN = /^\d+$/;
const THOUSANDS_TOKEN = /^(\d+(?:\.\d*)?|\.\d+)k$/;

export function parseCountToken(token: string): number | null {
	const value = token.toLowerCase();
	const thousands = THOUSANDS_TOKEN.exec(value);
	if (thousands?.[1]) {
		return Math.trunc(Number.parseFloat(thousands[1]) * 1000);
	}
	if (INTEGER_TOKEN.test(value)) {
		return Number.parseInt(value, 10);
	}
	return null;
}

/**
 * Reads "<count> <label>" from the container text. The first occurrence of
 * the label wins, even when it sits inside the post body.
 */
export function countBeforeLabel(
	text: string,
	label: EngagementLabel,
): number | null {
	const lowered = text.toLowerCase();
	const index = lowered.indexOf(label);
	if (index === -1) return null;

	const token = lowered.slice(0, index).split(/\s+/).filter(Boolean).at(-1);
	return token ? parseCountToken(token) : null;
}

export function engagementStrategies(
	label: EngagementLabel,
): FieldStrategies<number> {
	return [
		{
			name: `${label}-label`,
			attempt: ({ container }) =>
				countBeforeLabel(visibleText(container), label),
		},
	];
}

// ── Timestamp ──────────────────────────────────────────────────────────

const TIMESTAMP_ELEMENTS = "abbr, span, a, time";
const TIMESTAMP_ATTRIBUTES = [
	"data-utime",
	"data-tooltip-content",
	"datetime",
	"title",
] as const;

export const timestampStrategies: FieldStrategies<number> = [
	{
		name: "timestamp-attribute",
		attempt: ({ $, container, nowMs }) => {
			for (const element of $(container).find(TIMESTAMP_ELEMENTS).toArray()) {
				for (const attribute of TIMESTAMP_ATTRIBUTES) {
					const resolved = normalizeTimestamp(
						$(element).attr(attribute),
						nowMs,
					);
					if (resolved !== null) return resolved;
				}
			}
			return null;
		},
	},
	{
		name: "container-text",
		attempt: ({ container, nowMs }) =>
			normalizeTimestamp(visibleText(container), nowMs),
	},
	{
		name: "now",
		attempt: ({ nowMs }) => normalizeTimestamp("now", nowMs),
	},
];
