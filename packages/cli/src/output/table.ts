/**
 * civic-ledger CLI - Table Output Formatter
 *
 * Formats records as an aligned plain-text table. Columns are the union of
 * record keys in first-seen order; long values are truncated.
 */

const DEFAULT_MAX_COLUMN_WIDTH = 48

function stringify(value: unknown): string {
	if (value === null || value === undefined) {
		return ""
	}
	if (typeof value === "object") {
		return JSON.stringify(value)
	}
	return String(value)
}

function truncate(str: string, maxLen: number): string {
	if (str.length <= maxLen) {
		return str
	}
	if (maxLen <= 3) {
		return str.slice(0, maxLen)
	}
	return `${str.slice(0, maxLen - 3)}...`
}

/**
 * Format records as an aligned table with a dashed rule under the header.
 * Multi-line values are shown on one line.
 */
export function formatAsTable(
	records: ReadonlyArray<Readonly<Record<string, unknown>>>,
	options?: { readonly maxColumnWidth?: number },
): string {
	if (records.length === 0) {
		return "(no results)"
	}

	const maxColumnWidth = options?.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH
	const fields = Array.from(new Set(records.flatMap((record) => Object.keys(record))))

	const cells = records.map((record) =>
		fields.map((field) => stringify(record[field]).replace(/\s*\n\s*/g, " ")),
	)
	const widths = fields.map((field, column) =>
		Math.min(
			Math.max(field.length, ...cells.map((row) => row[column]?.length ?? 0)),
			maxColumnWidth,
		),
	)

	const renderRow = (values: ReadonlyArray<string>) =>
		values
			.map((value, column) => {
				const width = widths[column] ?? value.length
				return truncate(value, width).padEnd(width)
			})
			.join("  ")
			.trimEnd()

	return [
		renderRow(fields),
		widths.map((width) => "-".repeat(width)).join("  "),
		...cells.map(renderRow),
	].join("\n")
}
