import type { DiagnosticSink } from "./types.js";

/**
 * One way of reading a field. Returns null when this heuristic finds nothing.
 */
export type Strategy<TInput, TValue> = {
	readonly name: string;
	readonly attempt: (input: TInput) => TValue | null;
};

export type FieldResult<TValue> =
	| { readonly status: "found"; readonly value: TValue; readonly strategy: string }
	| { readonly status: "missing" };

/**
 * Try each strategy in order and return the first match. A strategy that
 * throws is reported and counts as no match.
 */
export function resolveField<TInput, TValue>(
	field: string,
	strategies: ReadonlyArray<Strategy<TInput, TValue>>,
	input: TInput,
	report: DiagnosticSink,
): FieldResult<TValue> {
	for (const strategy of strategies) {
		try {
			const value = strategy.attempt(input);
			if (value !== null) {
				return { status: "found", value, strategy: strategy.name };
			}
		} catch (error) {
			report({
				level: "debug",
				message: `${field}: strategy '${strategy.name}' failed`,
				field,
				error,
			});
		}
	}

	return { status: "missing" };
}

export function valueOr<TValue>(
	result: FieldResult<TValue>,
	fallback: TValue,
): TValue {
	return result.status === "found" ? result.value : fallback;
}
