/**
 * Static extraction of migration metadata from entry-script source.
 *
 * The script is parsed, never evaluated. Recognised declarations, in order
 * of precedence:
 * - the object literal passed to `defineMigration(...)` (default-exported
 *   directly or through a top-level const)
 * - a default-exported object literal
 * - top-level `AUTHOR` / `DATE` / `DESCRIPTION` string constants
 *
 * Property values may be string literals or identifiers naming a top-level
 * string constant.
 */

import { Option } from "effect";
import ts from "typescript";

export interface ScannedMetadata {
	readonly author?: string;
	readonly date?: string;
	readonly description?: string;
}

type MetadataField = keyof ScannedMetadata;

const FIELDS: ReadonlyArray<MetadataField> = ["author", "date", "description"];

const CONSTANT_NAMES: Readonly<Record<MetadataField, string>> = {
	author: "AUTHOR",
	date: "DATE",
	description: "DESCRIPTION",
};

const scriptKindFor = (fileName: string): ts.ScriptKind => {
	if (fileName.endsWith(".ts") || fileName.endsWith(".mts")) {
		return ts.ScriptKind.TS;
	}
	return ts.ScriptKind.JS;
};

const stringValue = (
	node: ts.Expression,
	constants: ReadonlyMap<string, string>,
): string | undefined => {
	if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
		return node.text;
	}
	if (ts.isIdentifier(node)) {
		return constants.get(node.text);
	}
	if (ts.isAsExpression(node) || ts.isSatisfiesExpression(node)) {
		return stringValue(node.expression, constants);
	}
	return undefined;
};

const propertyName = (name: ts.PropertyName): string | undefined =>
	ts.isIdentifier(name) || ts.isStringLiteral(name) ? name.text : undefined;

const readObjectLiteral = (
	literal: ts.ObjectLiteralExpression,
	constants: ReadonlyMap<string, string>,
): Partial<Record<MetadataField, string>> => {
	const found: Partial<Record<MetadataField, string>> = {};
	for (const property of literal.properties) {
		if (ts.isPropertyAssignment(property)) {
			const name = propertyName(property.name);
			const field = FIELDS.find((candidate) => candidate === name);
			if (field !== undefined) {
				found[field] = stringValue(property.initializer, constants);
			}
		} else if (ts.isShorthandPropertyAssignment(property)) {
			const field = FIELDS.find(
				(candidate) => candidate === property.name.text,
			);
			if (field !== undefined) {
				found[field] = constants.get(property.name.text);
			}
		}
	}
	return found;
};

/**
 * The object literal of a declaration expression, unwrapping
 * `defineMigration(...)`, `as` and `satisfies`.
 */
const declarationLiteral = (
	node: ts.Expression,
): ts.ObjectLiteralExpression | undefined => {
	if (ts.isObjectLiteralExpression(node)) {
		return node;
	}
	if (ts.isAsExpression(node) || ts.isSatisfiesExpression(node)) {
		return declarationLiteral(node.expression);
	}
	if (
		ts.isCallExpression(node) &&
		ts.isIdentifier(node.expression) &&
		node.expression.text === "defineMigration" &&
		node.arguments.length > 0
	) {
		const [argument] = node.arguments;
		return ts.isObjectLiteralExpression(argument) ? argument : undefined;
	}
	return undefined;
};

const isDefineMigrationCall = (node: ts.Expression): boolean =>
	ts.isCallExpression(node) &&
	ts.isIdentifier(node.expression) &&
	node.expression.text === "defineMigration";

export const scanMigrationMetadata = (
	source: string,
	fileName: string,
): ScannedMetadata => {
	const sourceFile = ts.createSourceFile(
		fileName,
		source,
		ts.ScriptTarget.Latest,
		true,
		scriptKindFor(fileName),
	);

	const constants = new Map<string, string>();
	const declaredLiterals = new Map<string, ts.ObjectLiteralExpression>();
	let declaration: ts.ObjectLiteralExpression | undefined;

	for (const statement of sourceFile.statements) {
		if (!ts.isVariableStatement(statement)) continue;
		for (const variable of statement.declarationList.declarations) {
			if (!ts.isIdentifier(variable.name) || variable.initializer === undefined) {
				continue;
			}
			const literal = declarationLiteral(variable.initializer);
			if (literal !== undefined) {
				declaredLiterals.set(variable.name.text, literal);
				if (isDefineMigrationCall(variable.initializer) && declaration === undefined) {
					declaration = literal;
				}
				continue;
			}
			const value = stringValue(variable.initializer, constants);
			if (value !== undefined) {
				constants.set(variable.name.text, value);
			}
		}
	}

	for (const statement of sourceFile.statements) {
		if (ts.isExportAssignment(statement) && !statement.isExportEquals) {
			const literal = ts.isIdentifier(statement.expression)
				? declaredLiterals.get(statement.expression.text)
				: declarationLiteral(statement.expression);
			if (literal !== undefined) {
				declaration = literal;
			}
		}
	}

	const fromDeclaration =
		declaration === undefined ? {} : readObjectLiteral(declaration, constants);

	const result: Partial<Record<MetadataField, string>> = {};
	for (const field of FIELDS) {
		const value = fromDeclaration[field] ?? constants.get(CONSTANT_NAMES[field]);
		if (value !== undefined) {
			result[field] = value;
		}
	}
	return result;
};

/**
 * The first syntax error in `source`, with its position, if any.
 */
export const findSyntaxError = (
	source: string,
	fileName: string,
): Option.Option<string> => {
	const { diagnostics = [] } = ts.transpileModule(source, {
		fileName,
		reportDiagnostics: true,
	});
	const first = diagnostics.find(
		(diagnostic) =>
			diagnostic.category === ts.DiagnosticCategory.Error &&
			diagnostic.file !== undefined,
	);
	if (first === undefined) {
		return Option.none();
	}
	const text = ts.flattenDiagnosticMessageText(first.messageText, "\n");
	if (first.file === undefined || first.start === undefined) {
		return Option.some(text);
	}
	const { line, character } = first.file.getLineAndCharacterOfPosition(
		first.start,
	);
	return Option.some(`${text} (line ${line + 1}, column ${character + 1})`);
};
