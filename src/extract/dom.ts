import type { Cheerio, CheerioAPI } from "cheerio";
import { type AnyNode, type Element, hasChildren, isTag, isText } from "domhandler";

const HIDDEN_TAGS = new Set(["script", "style", "noscript", "template"]);

/**
 * Text a reader would see: every text node trimmed, empty ones dropped,
 * joined with single spaces. Script and style contents are skipped.
 */
export function visibleText(node: AnyNode): string {
	const parts: string[] = [];

	const walk = (current: AnyNode): void => {
		if (isText(current)) {
			const text = current.data.trim();
			if (text) parts.push(text);
			return;
		}
		if (isTag(current) && HIDDEN_TAGS.has(current.name)) return;
		if (hasChildren(current)) {
			for (const child of current.children) walk(child);
		}
	};

	walk(node);
	return parts.join(" ");
}

export function anchorText($: CheerioAPI, anchor: Element): string {
	return $(anchor).text().trim();
}

export function anchorsWithHref(
	$: CheerioAPI,
	root: Element,
): Cheerio<Element> {
	return $(root).find("a[href]");
}
