/**
 * civic-ledger CLI - Output Formatter Dispatcher
 *
 * Accepts a format flag and record array, delegates to the appropriate formatter.
 */

import { formatAsJson } from "./json.js"
import { formatAsYaml } from "./yaml.js"
import { formatAsTable } from "./table.js"

export type OutputFormat = "table" | "json" | "yaml"

export type OutputRecord = Readonly<Record<string, unknown>>

export function format(
	format: OutputFormat,
	records: ReadonlyArray<OutputRecord>,
): string {
	switch (format) {
		case "json":
			return formatAsJson(records)
		case "yaml":
			return formatAsYaml(records)
		case "table":
			return formatAsTable(records)
	}
}
