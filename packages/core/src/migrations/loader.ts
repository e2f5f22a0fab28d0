/**
 * Migration loading: resolve a descriptor's entry script to a module through
 * the `MigrationModuleSource` service, then check it against the migration
 * contract.
 */

import { Context, Effect, Layer, Option } from "effect";
import { ContractError, LoadError } from "../errors/migration-errors.js";
import type { MigrationContext } from "../types/context-types.js";
import type {
	LoadedMigration,
	MigrationDescriptor,
	MigrationMetadata,
} from "../types/migration-types.js";
import { parseAuthoredDate } from "./naming.js";

// ============================================================================
// Module Source Service
// ============================================================================

export interface MigrationModuleSourceShape {
	/**
	 * Evaluate the descriptor's entry script and return its module namespace.
	 * Every call must yield a fresh evaluation or an immutable cached one;
	 * loading one migration never registers state another load can observe.
	 */
	readonly importModule: (
		descriptor: MigrationDescriptor,
	) => Effect.Effect<unknown, LoadError>;
}

export class MigrationModuleSource extends Context.Tag("MigrationModuleSource")<
	MigrationModuleSource,
	MigrationModuleSourceShape
>() {}

/**
 * Module thunks keyed by full name, e.g.
 * `{ "000-initial-locations": () => import("./000-initial-locations/migrate.js") }`.
 */
export type MigrationModuleRegistry = Readonly<
	Record<string, () => unknown>
>;

/**
 * Build the LoadError for an exception raised while a module was evaluated.
 */
export const toLoadError = (
	descriptor: MigrationDescriptor,
	error: unknown,
): LoadError => {
	if (error instanceof SyntaxError) {
		return new LoadError({
			migration: descriptor.fullName,
			phase: "load",
			scriptPath: descriptor.entryScript,
			reason: "syntax-error",
			message: describeSyntaxError(descriptor, error),
			cause: error,
		});
	}
	const detail = error instanceof Error ? error.message : String(error);
	return new LoadError({
		migration: descriptor.fullName,
		phase: "load",
		scriptPath: descriptor.entryScript,
		reason: "evaluation-error",
		message: `Failed to load migration script ${descriptor.fullName}: ${detail}`,
		cause: error,
	});
};

const SOURCE_LOCATION = /^(.*):(\d+)$/;

/**
 * Format a syntax error with the file, line and offending text when the
 * runtime exposes them. Node starts a parse error's stack with `file:line`
 * followed by the offending source line.
 */
export const describeSyntaxError = (
	descriptor: MigrationDescriptor,
	error: SyntaxError,
): string => {
	const [header = "", source = ""] = (error.stack ?? "").split("\n");
	const location = SOURCE_LOCATION.exec(header.trim());
	const file = location?.[1] ?? descriptor.entryScript;
	const line = location?.[2] ?? "?";
	const offending = location === null ? "" : source.trim();
	return [
		`Syntax error in migration script ${descriptor.fullName}:`,
		`  File: ${file}`,
		`  Line ${line}: ${offending}`,
		`  ${error.message}`,
	].join("\n");
};

/**
 * Module source backed by a fixed registry. Used where migrations are linked
 * into the program ahead of time, and in tests.
 */
export const makeStaticModuleSourceLayer = (
	registry: MigrationModuleRegistry,
): Layer.Layer<MigrationModuleSource> =>
	Layer.succeed(MigrationModuleSource, {
		importModule: (descriptor) => {
			const thunk = Object.hasOwn(registry, descriptor.fullName)
				? registry[descriptor.fullName]
				: undefined;
			if (thunk === undefined) {
				return Effect.fail(
					new LoadError({
						migration: descriptor.fullName,
						phase: "load",
						scriptPath: descriptor.entryScript,
						reason: "missing-script",
						message: `Migration script not found: ${descriptor.entryScript}`,
					}),
				);
			}
			return Effect.tryPromise({
				try: async () => thunk(),
				catch: (error) => toLoadError(descriptor, error),
			});
		},
	});

// ============================================================================
// Contract Validation
// ============================================================================

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null;

const isAsyncFunction = (value: Function): boolean =>
	Object.prototype.toString.call(value) === "[object AsyncFunction]";

const nonEmptyString = (value: unknown): Option.Option<string> =>
	typeof value === "string" && value.trim().length > 0
		? Option.some(value)
		: Option.none();

const METADATA_FIELDS = ["author", "date", "description"] as const;

/**
 * Check a module namespace against the migration contract: a default export
 * from `defineMigration` carrying an async `migrate` and non-empty
 * `author`, `date` and `description`.
 */
export const validateMigrationModule = (
	descriptor: MigrationDescriptor,
	moduleNamespace: unknown,
): Effect.Effect<LoadedMigration, ContractError> =>
	Effect.gen(function* () {
		const name = descriptor.fullName;
		const contractError = (
			reason: ContractError["reason"],
			message: string,
			missingFields: ReadonlyArray<string> = [],
		) =>
			new ContractError({
				migration: name,
				phase: "load",
				reason,
				missingFields,
				message,
			});

		const declaration = isRecord(moduleNamespace)
			? moduleNamespace.default
			: undefined;
		if (!isRecord(declaration)) {
			return yield* Effect.fail(
				contractError(
					"missing-declaration",
					`Migration script ${name} must default-export a migration declared with defineMigration()`,
				),
			);
		}

		const migrate = declaration.migrate;
		if (migrate === undefined) {
			return yield* Effect.fail(
				contractError(
					"missing-entry-point",
					`Migration script ${name} must define a 'migrate' function`,
				),
			);
		}
		if (typeof migrate !== "function") {
			return yield* Effect.fail(
				contractError(
					"not-callable",
					`'migrate' in ${name} must be a callable function`,
				),
			);
		}
		if (!isAsyncFunction(migrate)) {
			return yield* Effect.fail(
				contractError(
					"not-async",
					`'migrate' in ${name} must be async (declared with 'async')`,
				),
			);
		}

		const values = METADATA_FIELDS.map((field) => nonEmptyString(declaration[field]));
		const missing = METADATA_FIELDS.filter((_, index) =>
			Option.isNone(values[index]),
		);
		const [author, date, description] = values;
		if (
			missing.length > 0 ||
			Option.isNone(author) ||
			Option.isNone(date) ||
			Option.isNone(description)
		) {
			return yield* Effect.fail(
				contractError(
					"missing-metadata",
					`Migration script ${name} is missing required metadata: ${missing.join(", ")}`,
					missing,
				),
			);
		}

		const parsedDate = parseAuthoredDate(date.value);
		if (Option.isNone(parsedDate)) {
			return yield* Effect.fail(
				contractError(
					"invalid-date",
					`Migration script ${name} has an invalid date '${date.value}' (expected YYYY-MM-DD)`,
				),
			);
		}

		const metadata: MigrationMetadata = {
			author: author.value,
			date: parsedDate.value,
			description: description.value,
		};
		const entryPoint = async (context: MigrationContext): Promise<void> => {
			await Reflect.apply(migrate, declaration, [context]);
		};

		yield* Effect.logDebug(
			`Validated migration script ${name}: author=${metadata.author}, date=${metadata.date}`,
		);
		return { descriptor, metadata, entryPoint };
	});

/**
 * Load and validate the entry script for `descriptor`.
 */
export const loadMigration = (
	descriptor: MigrationDescriptor,
): Effect.Effect<
	LoadedMigration,
	LoadError | ContractError,
	MigrationModuleSource
> =>
	Effect.gen(function* () {
		yield* Effect.logDebug(`Loading script for migration ${descriptor.fullName}`);
		const source = yield* MigrationModuleSource;
		const moduleNamespace = yield* source.importModule(descriptor);
		return yield* validateMigrationModule(descriptor, moduleNamespace);
	});
