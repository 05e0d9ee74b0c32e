import type { Element } from "domhandler";
import type { Strategy } from "./cascade.js";
import { anchorText, anchorsWithHref, visibleText } from "./dom.js";
import {
	countAt,
	firstList,
	firstString,
	isRecord,
	type LooseRecord,
	recordAt,
} from "./loose.js";
import type { ContainerScope } from "./scope.js";
import { normalizeTimestamp } from "./time.js";
import { type Comment, EMPTY_USER, type User } from "./types.js";
import { deriveUserId, normalizeUrl } from "./url.js";

const COMMENT_CONTAINERS = "div[aria-label*='Comment']";

function commentAuthor(scope: ContainerScope, root: Element): User {
	const { $, origin } = scope;
	for (const anchor of anchorsWithHref($, root).toArray()) {
		const name = anchorText($, anchor);
		if (!name) continue;
		const url = normalizeUrl($(anchor).attr("href") ?? "", origin);
		return { id: deriveUserId(url, origin), name, url };
	}
	return EMPTY_USER;
}

function commentsFromContainers(scope: ContainerScope): Comment[] | null {
	const { $, container, nowMs, report } = scope;
	const nodes = $(container).find(COMMENT_CONTAINERS).toArray();
	if (nodes.length === 0) return null;

	const comments: Comment[] = [];
	nodes.forEach((node, index) => {
		try {
			const text = visibleText(node);
			comments.push({
				text,
				createdAt: normalizeTimestamp(text, nowMs) ?? 0,
				author: commentAuthor(scope, node),
				reactionCount: 0,
				commentCount: 0,
			});
		} catch (error) {
			report({
				level: "debug",
				message: `topComments: skipped comment #${index}`,
				field: "topComments",
				error,
			});
		}
	});
	return comments;
}

/** The text between the first "{" and the last "}", if any. */
export function jsonBlob(source: string): string | null {
	const start = source.indexOf("{");
	const end = source.lastIndexOf("}");
	if (start === -1 || end === -1 || end <= start) return null;
	return source.slice(start, end + 1);
}

function commentText(node: LooseRecord): string {
	const direct = firstString(node, ["text", "body"]);
	if (direct) return direct;
	// Some payloads wrap the body as { body: { text } }
	return firstString(recordAt(node, "body"), ["text"]);
}

export function commentFromJson(item: unknown, nowMs: number): Comment | null {
	if (!isRecord(item)) return null;

	const node = isRecord(item.node) ? item.node : item;
	const author = recordAt(node, "author");
	const createdRaw = firstString(node, ["created_time", "created_at"]);

	return {
		text: commentText(node),
		createdAt: createdRaw ? (normalizeTimestamp(createdRaw, nowMs) ?? 0) : 0,
		author: {
			id: firstString(author, ["id"]),
			name: firstString(author, ["name"]),
			url: firstString(author, ["url"]),
		},
		reactionCount: countAt(node, "reaction_count"),
		commentCount: countAt(node, "comment_count"),
	};
}

export function commentsFromScriptText(
	source: string,
	nowMs: number,
): Comment[] {
	const blob = jsonBlob(source);
	if (blob === null) return [];

	const data: unknown = JSON.parse(blob);
	if (!isRecord(data)) return [];

	const comments: Comment[] = [];
	for (const item of firstList(data, ["comments", "edges"])) {
		const comment = commentFromJson(item, nowMs);
		if (comment) comments.push(comment);
	}
	return comments;
}

function commentsFromEmbeddedJson(scope: ContainerScope): Comment[] {
	const { $, container, nowMs, report } = scope;
	const comments: Comment[] = [];

	$(container)
		.find("script")
		.each((index, script) => {
			const source = $(script).text();
			if (!source.toLowerCase().includes("comment")) return;
			try {
				comments.push(...commentsFromScriptText(source, nowMs));
			} catch (error) {
				report({
					level: "debug",
					message: `topComments: unreadable script block #${index}`,
					field: "topComments",
					error,
				});
			}
		});

	return comments;
}

export const commentStrategies: ReadonlyArray<
	Strategy<ContainerScope, Comment[]>
> = [
	{ name: "comment-containers", attempt: commentsFromContainers },
	{ name: "embedded-json", attempt: commentsFromEmbeddedJson },
];
