import { Option } from "effect";

// ============================================================================
// Folder Naming
// ============================================================================

/**
 * Folder names a migration may use: a 3-digit ordinal, a hyphen, then a
 * kebab-case slug.
 */
export const MIGRATION_FOLDER_PATTERN = /^(\d{3})-([a-z0-9-]+)$/;

export interface NamingValidationResult {
	readonly isValid: boolean;
	readonly errors: ReadonlyArray<string>;
}

/**
 * Check a folder name against the naming convention, reporting every rule
 * it breaks.
 */
export const validateMigrationNaming = (
	folderName: string,
): NamingValidationResult => {
	const errors: string[] = [];

	if (!/^\d{3}/.test(folderName)) {
		errors.push("must start with a 3-digit numeric prefix (e.g. '000-')");
	} else if (folderName.charAt(3) !== "-") {
		errors.push("numeric prefix must be followed by a hyphen");
	} else {
		const slug = folderName.slice(4);
		if (slug.length === 0) {
			errors.push("must include a descriptive name after the prefix");
		} else if (!/^[a-z0-9-]+$/.test(slug)) {
			errors.push(
				"name may only contain lowercase letters, digits and hyphens",
			);
		}
	}

	return { isValid: errors.length === 0, errors };
};

/**
 * Split a valid folder name into its ordinal and slug.
 */
export const parseMigrationFolderName = (
	folderName: string,
): Option.Option<{ readonly ordinal: number; readonly slug: string }> => {
	const match = MIGRATION_FOLDER_PATTERN.exec(folderName);
	if (match === null) {
		return Option.none();
	}
	return Option.some({ ordinal: Number.parseInt(match[1], 10), slug: match[2] });
};

export const formatFullName = (ordinal: number, slug: string): string =>
	`${String(ordinal).padStart(3, "0")}-${slug}`;

// ============================================================================
// Dates
// ============================================================================

const isLeapYear = (year: number): boolean =>
	(year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number => {
	if (month === 2) {
		return isLeapYear(year) ? 29 : 28;
	}
	return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

/**
 * Accepts only real calendar dates written as `YYYY-MM-DD`.
 */
export const parseAuthoredDate = (text: string): Option.Option<string> => {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text.trim());
	if (match === null) {
		return Option.none();
	}
	const [, year, month, day] = match;
	const y = Number(year);
	const m = Number(month);
	const d = Number(day);
	const valid = m >= 1 && m <= 12 && d >= 1 && d <= daysInMonth(y, m);
	return valid ? Option.some(`${year}-${month}-${day}`) : Option.none();
};
