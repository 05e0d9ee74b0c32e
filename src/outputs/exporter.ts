import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import ExcelJS from "exceljs";
import type { OutputFormat } from "../config.js";
import type { Post } from "../extract/types.js";
import { log } from "../ui/logger.js";

export const TABULAR_COLUMNS = [
	"createdAt",
	"url",
	"user.id",
	"user.name",
	"user.url",
	"text",
	"reactionCount",
	"shareCount",
	"commentCount",
	"attachments",
	"topComments",
] as const;

export type TabularColumn = (typeof TABULAR_COLUMNS)[number];
export type FlatPost = Record<TabularColumn, string | number>;

/**
 * One row per post; nested lists are kept as JSON text in a single cell.
 */
export function flattenPost(post: Post): FlatPost {
	return {
		createdAt: post.createdAt,
		url: post.url,
		"user.id": post.user.id,
		"user.name": post.user.name,
		"user.url": post.user.url,
		text: post.text,
		reactionCount: post.reactionCount,
		shareCount: post.shareCount,
		commentCount: post.commentCount,
		attachments: JSON.stringify(post.attachments),
		topComments: JSON.stringify(post.topComments),
	};
}

function buildWorkbook(posts: readonly Post[]): ExcelJS.Workbook {
	const workbook = new ExcelJS.Workbook();
	const sheet = workbook.addWorksheet("posts");
	sheet.columns = TABULAR_COLUMNS.map((key) => ({ header: key, key }));
	sheet.addRows(posts.map(flattenPost));
	return workbook;
}

export type ExportArgs = {
	posts: readonly Post[];
	outputDir: string;
	baseFilename: string;
	formats: readonly OutputFormat[];
};

/**
 * Write the batch in every requested format and return the written paths.
 */
export async function exportPosts(args: ExportArgs): Promise<string[]> {
	const { posts, outputDir, baseFilename } = args;
	if (posts.length === 0) {
		log.warn("No posts to export, skipping");
		return [];
	}

	await mkdir(outputDir, { recursive: true });
	const formats = new Set(args.formats);
	const written: string[] = [];

	if (formats.has("json")) {
		const jsonPath = path.join(outputDir, `${baseFilename}.json`);
		await writeFile(jsonPath, `${JSON.stringify(posts, null, 2)}\n`, "utf8");
		written.push(jsonPath);
	}

	if (formats.has("csv") || formats.has("xlsx")) {
		const workbook = buildWorkbook(posts);

		if (formats.has("csv")) {
			const csvPath = path.join(outputDir, `${baseFilename}.csv`);
			await workbook.csv.writeFile(csvPath);
			written.push(csvPath);
		}

		if (formats.has("xlsx")) {
			const xlsxPath = path.join(outputDir, `${baseFilename}.xlsx`);
			await workbook.xlsx.writeFile(xlsxPath);
			written.push(xlsxPath);
		}
	}

	for (const filePath of written) {
		log.info(`Exported ${posts.length} posts`, {}, { path: filePath });
	}

	return written;
}
