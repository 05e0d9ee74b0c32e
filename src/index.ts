export * from "./extract/index.js";
export {
	type Config,
	loadConfig,
	type OutputFormat,
	parseConfig,
} from "./config.js";
export {
	exportPosts,
	type ExportArgs,
	flattenPost,
	TABULAR_COLUMNS,
} from "./outputs/exporter.js";
export {
	buildPageUrl,
	createDispatcher,
	createPageFetcher,
	fetchGroupPage,
} from "./sources/group/fetch.js";
export { listGroupPages, scrapeGroup } from "./sources/group/index.js";
export type {
	FetchOptions,
	GroupRunResult,
	PageFetcher,
	ScrapeGroupArgs,
} from "./sources/group/types.js";
