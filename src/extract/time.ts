const EPOCH_PATTERN = /^\d{9,12}$/;
const MILLISECONDS_THRESHOLD = 10_000_000_000;

const RELATIVE_PATTERN =
	/\b(\d+)\s*(s|sec|secs|second|seconds|m|min|mins|minute|minutes|h|hr|hrs|hour|hours|d|day|days|w|wk|wks|week|weeks)\b/;

const UNIT_SECONDS: Record<string, number> = {
	s: 1,
	m: 60,
	h: 60 * 60,
	d: 24 * 60 * 60,
	w: 7 * 24 * 60 * 60,
};

// Words a human-readable timestamp may contain besides numbers and separators
const DATE_WORDS =
	/\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?|mon(?:day)?|tue(?:s(?:day)?)?|wed(?:nesday)?|thu(?:r(?:s(?:day)?)?)?|fri(?:day)?|sat(?:urday)?|sun(?:day)?|am|pm|at|on|of|utc|gmt)\b/gi;
const ORDINAL_NUMBERS = /\d+(?:st|nd|rd|th)?/gi;
const DATE_SEPARATORS = /^[\s,.:/+\-tz]*$/i;

const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_LOCAL_DATE_TIME =
	/^(\d{4}-\d{2}-\d{2})[t ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/i;
const YEAR_TOKEN = /\b\d{4}\b/;
const ZONE_SUFFIX =
	/\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:z|[+-]\d{2}:?\d{2})$/i;
const ZONE_WORD = /\b(?:utc|gmt)\b/i;

/**
 * Convert a timestamp found in feed markup into epoch seconds.
 *
 * Accepts the keyword "now", raw epoch values (seconds or milliseconds),
 * relative tokens such as "3 h" or "2 days", and absolute dates. Absolute
 * dates without an explicit offset are read as UTC.
 *
 * Returns null when nothing matches; never throws.
 */
export function normalizeTimestamp(
	raw: string | null | undefined,
	nowMs: number = Date.now(),
): number | null {
	if (!raw) return null;

	const text = raw.trim().toLowerCase();
	if (!text) return null;

	const nowSeconds = Math.floor(nowMs / 1000);

	if (text === "now") {
		return nowSeconds;
	}

	if (EPOCH_PATTERN.test(text)) {
		const value = Number.parseInt(text, 10);
		return value > MILLISECONDS_THRESHOLD
			? Math.floor(value / 1000)
			: value;
	}

	const relative = parseRelative(text, nowSeconds);
	if (relative !== null) {
		return relative;
	}

	return parseAbsolute(raw.trim(), nowMs);
}

function parseRelative(text: string, nowSeconds: number): number | null {
	const match = RELATIVE_PATTERN.exec(text);
	if (!match) return null;

	const [, amountText, unit] = match;
	if (!amountText || !unit) return null;

	const unitSeconds = UNIT_SECONDS[unit.charAt(0)];
	if (unitSeconds === undefined) return null;

	return nowSeconds - Number.parseInt(amountText, 10) * unitSeconds;
}

function parseAbsolute(text: string, nowMs: number): number | null {
	if (!looksLikeDate(text)) return null;

	const cleaned = text.replace(/\bat\b/gi, " ").replace(/\s+/g, " ").trim();
	const parsed = new Date(withExplicitZone(cleaned));
	if (Number.isNaN(parsed.getTime())) return null;

	if (YEAR_TOKEN.test(cleaned)) {
		return Math.floor(parsed.getTime() / 1000);
	}

	// No year given: the runtime fills in a fixed one, the current year applies
	const utcMs = Date.UTC(
		new Date(nowMs).getUTCFullYear(),
		parsed.getUTCMonth(),
		parsed.getUTCDate(),
		parsed.getUTCHours(),
		parsed.getUTCMinutes(),
		parsed.getUTCSeconds(),
	);
	return Math.floor(utcMs / 1000);
}

/** Pin dates without an offset to UTC so the host time zone never applies. */
function withExplicitZone(text: string): string {
	if (ISO_DATE_ONLY.test(text)) return text;
	if (ZONE_SUFFIX.test(text) || ZONE_WORD.test(text)) return text;

	const isoLocal = ISO_LOCAL_DATE_TIME.exec(text);
	if (isoLocal) return `${isoLocal[1]}T${isoLocal[2]}Z`;

	return `${text} UTC`;
}

function looksLikeDate(text: string): boolean {
	if (!/\d/.test(text) || /^\d+$/.test(text)) return false;

	const residue = text.replace(DATE_WORDS, " ").replace(ORDINAL_NUMBERS, " ");
	return DATE_SEPARATORS.test(residue);
}
