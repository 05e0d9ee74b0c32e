export { resolveField, valueOr } from "./cascade.js";
export type { FieldResult, Strategy } from "./cascade.js";
export { commentsFromScriptText } from "./comments.js";
export { visibleText } from "./dom.js";
export {
	extractPosts,
	findPostContainers,
	PostExtractor,
	type PostExtractorOptions,
} from "./extractor.js";
export {
	countBeforeLabel,
	dedupeAttachments,
	type EngagementLabel,
} from "./fields.js";
export { normalizeTimestamp } from "./time.js";
export type {
	Attachment,
	Comment,
	Diagnostic,
	DiagnosticSink,
	ImageAttachment,
	LinkAttachment,
	Post,
	User,
} from "./types.js";
export { EMPTY_USER } from "./types.js";
export {
	DEFAULT_SITE_ORIGIN,
	deriveUserId,
	isSiteUrl,
	normalizeUrl,
} from "./url.js";
