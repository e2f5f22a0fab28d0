/**
 * Format records as pretty-printed JSON (2-space indentation).
 */
export function formatAsJson(
	records: ReadonlyArray<Readonly<Record<string, unknown>>>,
): string {
	return JSON.stringify(records, null, 2)
}
