// Accessors for JSON of unknown shape: missing keys and wrong types read as "no data".

export type LooseRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is LooseRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function recordAt(record: LooseRecord, key: string): LooseRecord {
	const value = record[key];
	return isRecord(value) ? value : {};
}

/** First key holding a non-empty array. */
export function firstList(
	record: LooseRecord,
	keys: readonly string[],
): unknown[] {
	for (const key of keys) {
		const value = record[key];
		if (Array.isArray(value) && value.length > 0) return value;
	}
	return [];
}

/** First key holding a non-empty string (numbers are stringified). */
export function firstString(
	record: LooseRecord,
	keys: readonly string[],
): string {
	for (const key of keys) {
		const value = record[key];
		if (typeof value === "string" && value !== "") return value;
		if (typeof value === "number" && Number.isFinite(value)) {
			return String(value);
		}
	}
	return "";
}

export function countAt(record: LooseRecord, key: string): number {
	const value = record[key];
	if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
		return Math.trunc(value);
	}
	if (typeof value === "string" && /^\d+$/.test(value)) {
		return Number.parseInt(value, 10);
	}
	return 0;
}
