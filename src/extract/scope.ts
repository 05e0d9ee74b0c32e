import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { DiagnosticSink } from "./types.js";

/** Everything a field strategy may look at while reading one container. */
export type ContainerScope = {
	readonly $: CheerioAPI;
	readonly container: Element;
	readonly fallbackUrl: string;
	readonly origin: string;
	readonly nowMs: number;
	readonly report: DiagnosticSink;
};
