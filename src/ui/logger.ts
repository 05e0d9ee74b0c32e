import pc from "picocolors";
import { pino } from "pino";
import type { Diagnostic, DiagnosticSink } from "../extract/types.js";

// ── Types ──────────────────────────────────────────────────────────────

export type LogContext = {
	group?: string;
	page?: number;
};

export type LogParams = Record<string, string | number>;

export type LogLevel = "debug" | "info" | "warn" | "error";

// ── Backend ────────────────────────────────────────────────────────────

export const logger = pino({
	level: process.env.LOG_LEVEL ?? "info",
	transport: {
		target: "pino-pretty",
		options: {
			colorize: true,
			translateTime: "HH:MM:ss",
			ignore: "pid,hostname",
			messageFormat: "{msg}",
			singleLine: true,
		},
	},
});

export function setLogLevel(level: LogLevel): void {
	logger.level = level;
}

/** `-v` and beyond turn on debug output, which includes extractor diagnostics. */
export function levelForVerbosity(verbose: number): LogLevel {
	if (verbose > 0) return "debug";
	const fromEnv = process.env.LOG_LEVEL;
	return fromEnv === "debug" || fromEnv === "warn" || fromEnv === "error"
		? fromEnv
		: "info";
}

// ── Formatting helpers ─────────────────────────────────────────────────

const COL_GROUP = 40;

function groupTag(group?: string): string {
	if (!group) return "";
	const label = group.replace(/^https?:\/\/(www\.)?/, "");
	const trimmed =
		label.length > COL_GROUP ? `${label.slice(0, COL_GROUP - 3)}...` : label;
	return pc.magenta(trimmed);
}

function pageTag(page?: number): string {
	return page === undefined ? "" : pc.cyan(`p${page}`);
}

function formatParams(params?: LogParams): string {
	if (!params || Object.keys(params).length === 0) return "";
	const pairs = Object.entries(params)
		.map(([k, v]) => `${pc.dim(`${k}:`)} ${pc.dim(pc.cyan(String(v)))}`)
		.join(" ");
	return `${pc.dim("[")}${pairs}${pc.dim("]")}`;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function compose(
	message: string,
	context?: LogContext,
	params?: LogParams,
): string {
	return [
		groupTag(context?.group),
		pageTag(context?.page),
		message,
		formatParams(params),
	]
		.filter((part) => part !== "")
		.join(" ");
}

// ── Public API ─────────────────────────────────────────────────────────

export const log = {
	debug(msg: string, ctx?: LogContext, params?: LogParams): void {
		logger.debug(compose(msg, ctx, params));
	},
	info(msg: string, ctx?: LogContext, params?: LogParams): void {
		logger.info(compose(msg, ctx, params));
	},
	warn(msg: string, ctx?: LogContext, params?: LogParams): void {
		logger.warn(compose(msg, ctx, params));
	},
	error(msg: string, ctx?: LogContext, params?: LogParams): void {
		logger.error(compose(msg, ctx, params));
	},
};

/**
 * Bridge extractor diagnostics into the debug log for one page.
 */
export function createDiagnosticSink(context: LogContext): DiagnosticSink {
	return (diagnostic: Diagnostic) => {
		const params: LogParams = {};
		if (diagnostic.container !== undefined) {
			params.container = diagnostic.container;
		}
		if (diagnostic.error !== undefined) {
			params.error = describeError(diagnostic.error);
		}
		log.debug(diagnostic.message, context, params);
	};
}

// ── Domain helpers ─────────────────────────────────────────────────────

export function logGroupStart(group: string): void {
	log.info("starting", { group });
}

export function logPageResult(
	group: string,
	page: number,
	found: number,
	total: number,
): void {
	const foundLabel = found > 0 ? pc.green(`${found} posts`) : pc.dim("0 posts");
	log.info(`found ${foundLabel}`, { group, page }, { total });
}

export function logGroupComplete(group: string, total: number): void {
	log.info(`complete ${pc.dim(`(${total} posts)`)}`, { group });
}
