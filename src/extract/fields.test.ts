import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import {
	countBeforeLabel,
	dedupeAttachments,
	engagementStrategies,
	parseCountToken,
} from "./fields.js";
import { resolveField, valueOr } from "./cascade.js";
import type { ContainerScope } from "./scope.js";
import type { Attachment, Diagnostic } from "./types.js";

function scopeFor(html: string): ContainerScope {
	const $ = cheerio.load(html);
	const [container] = $("div[role='article']").toArray();
	if (!container) throw new Error("fixture has no article");
	return {
		$,
		container,
		fallbackUrl: "",
		origin: "https://www.facebook.com",
		nowMs: 0,
		report: () => {},
	};
}

describe("parseCountToken", () => {
	it("reads plain integers", () => {
		expect(parseCountToken("340")).toBe(340);
	});

	it("expands thousands suffixes", () => {
		expect(parseCountToken("1.2k")).toBe(1200);
		expect(parseCountToken("3K")).toBe(3000);
		expect(parseCountToken(".5k")).toBe(500);
	});

	it("rejects anything else", () => {
		expect(parseCountToken("1,234")).toBeNull();
		expect(parseCountToken("many")).toBeNull();
		expect(parseCountToken("2m")).toBeNull();
	});
});

describe("countBeforeLabel", () => {
	const summary = "1.2k reactions 340 comments 5 shares";

	it("reads the token right before each label", () => {
		expect(countBeforeLabel(summary, "reactions")).toBe(1200);
		expect(countBeforeLabel(summary, "comments")).toBe(340);
		expect(countBeforeLabel(summary, "shares")).toBe(5);
	});

	it("is case-insensitive", () => {
		expect(countBeforeLabel("12 Shares", "shares")).toBe(12);
	});

	it("returns null without a label or a numeric token", () => {
		expect(countBeforeLabel("no engagement", "shares")).toBeNull();
		expect(countBeforeLabel("reactions", "reactions")).toBeNull();
		expect(countBeforeLabel("Great comments here", "comments")).toBeNull();
	});

	it("uses the first occurrence of the label", () => {
		expect(countBeforeLabel("few comments so far 9 comments", "comments")).toBeNull();
	});
});

describe("engagementStrategies", () => {
	it("reads counts spread over several elements", () => {
		const scope = scopeFor(`
			<div role="article">
				<span>1.2k</span><span>reactions</span>
				<div><span>340</span> comments</div>
			</div>`);

		const read = (label: "reactions" | "comments" | "shares") =>
			valueOr(
				resolveField(label, engagementStrategies(label), scope, scope.report),
				0,
			);

		expect(read("reactions")).toBe(1200);
		expect(read("comments")).toBe(340);
		expect(read("shares")).toBe(0);
	});
});

describe("dedupeAttachments", () => {
	const image: Attachment = { type: "image", url: "https://cdn.example.com/a.jpg", alt: "" };
	const sameUrlLink: Attachment = {
		type: "link",
		url: "https://cdn.example.com/a.jpg",
		text: "a",
	};

	it("keeps the first of each type and url pair in order", () => {
		const result = dedupeAttachments([
			image,
			sameUrlLink,
			{ ...image, alt: "again" },
		]);
		expect(result).toEqual([image, sameUrlLink]);
	});

	it("is idempotent", () => {
		const once = dedupeAttachments([image, image, sameUrlLink]);
		expect(dedupeAttachments(once)).toEqual(once);
	});
});

describe("resolveField", () => {
	it("returns the first strategy that matches", () => {
		const result = resolveField(
			"text",
			[
				{ name: "none", attempt: () => null },
				{ name: "first", attempt: () => "a" },
				{ name: "second", attempt: () => "b" },
			],
			undefined,
			() => {},
		);
		expect(result).toEqual({ status: "found", value: "a", strategy: "first" });
	});

	it("reports a failing strategy and moves on", () => {
		const diagnostics: Diagnostic[] = [];
		const result = resolveField(
			"url",
			[
				{
					name: "broken",
					attempt: () => {
						throw new Error("boom");
					},
				},
				{ name: "fallback", attempt: () => "x" },
			],
			undefined,
			(diagnostic) => diagnostics.push(diagnostic),
		);

		expect(result).toEqual({ status: "found", value: "x", strategy: "fallback" });
		expect(diagnostics).toHaveLength(1);
		expect(diagnostics[0]).toMatchObject({
			level: "debug",
			field: "url",
			message: "url: strategy 'broken' failed",
		});
	});

	it("reports missing when nothing matches", () => {
		const result = resolveField<undefined, string>(
			"text",
			[{ name: "none", attempt: () => null }],
			undefined,
			() => {},
		);
		expect(result).toEqual({ status: "missing" });
		expect(valueOr(result, "default")).toBe("default");
	});
});
