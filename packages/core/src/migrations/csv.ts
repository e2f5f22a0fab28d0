// ============================================================================
// CSV Reading
// ============================================================================

/**
 * Split delimited text into rows of raw fields. Handles quoted fields,
 * doubled quotes inside them, embedded newlines and CRLF line endings.
 * A trailing newline does not produce an empty row. Throws on an empty
 * delimiter.
 */
export const parseCsvRows = (
	text: string,
	delimiter = ",",
): ReadonlyArray<ReadonlyArray<string>> => {
	if (delimiter.length === 0) {
		throw new Error("CSV delimiter must not be empty");
	}
	const rows: string[][] = [];
	let row: string[] = [];
	let field = "";
	let inQuotes = false;
	let index = 0;

	const endField = () => {
		row.push(field);
		field = "";
	};
	const endRow = () => {
		endField();
		rows.push(row);
		row = [];
	};

	const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

	while (index < source.length) {
		const char = source[index];
		if (inQuotes) {
			if (char === '"') {
				if (source[index + 1] === '"') {
					field += '"';
					index += 2;
					continue;
				}
				inQuotes = false;
			} else {
				field += char;
			}
			index++;
			continue;
		}

		if (char === '"' && field.length === 0) {
			inQuotes = true;
		} else if (source.startsWith(delimiter, index)) {
			endField();
			index += delimiter.length;
			continue;
		} else if (char === "\r" && source[index + 1] === "\n") {
			endRow();
			index += 2;
			continue;
		} else if (char === "\n") {
			endRow();
		} else {
			field += char;
		}
		index++;
	}

	if (field.length > 0 || row.length > 0) {
		endRow();
	}
	return rows;
};

/**
 * Parse delimited text into records keyed by the header row. Short rows get
 * empty strings for the missing columns; blank lines are skipped.
 */
export const parseCsv = (
	text: string,
	delimiter = ",",
): ReadonlyArray<Record<string, string>> => {
	const [header, ...body] = parseCsvRows(text, delimiter);
	if (header === undefined) {
		return [];
	}
	return body
		.filter((fields) => !(fields.length === 1 && fields[0] === ""))
		.map((fields) => {
			const record: Record<string, string> = {};
			header.forEach((column, position) => {
				record[column] = fields[position] ?? "";
			});
			return record;
		});
};
