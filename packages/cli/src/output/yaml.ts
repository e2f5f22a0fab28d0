import YAML from "yaml"

/**
 * Format records as a YAML sequence.
 */
export function formatAsYaml(
	records: ReadonlyArray<Readonly<Record<string, unknown>>>,
): string {
	return YAML.stringify(records, { indent: 2 })
}
