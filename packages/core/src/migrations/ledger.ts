/**
 * Applied-migration ledger.
 *
 * A migration is applied iff `<ledgerRoot>/<fullName>/metadata.json` exists.
 * The applied set is cached per ledger instance; the cache is only refreshed
 * by `invalidateCache`, so writers that need read-after-write consistency in
 * the same process must invalidate explicitly.
 */

import { join } from "node:path";
import { Context, Effect, Layer, Option, Ref, Schema } from "effect";
import {
	LedgerDecodeError,
	LedgerWriteError,
} from "../errors/migration-errors.js";
import type { StorageError } from "../errors/storage-errors.js";
import { StorageAdapter } from "../storage/storage-service.js";
import {
	ChangeSummaryRecord,
	LEDGER_FILES,
	type LedgerEntry,
	type LedgerEntryPaths,
	LedgerMetadataRecord,
} from "../types/ledger-types.js";
import type {
	ExecutionResult,
	MigrationDescriptor,
	MigrationMetadata,
} from "../types/migration-types.js";

// ============================================================================
// Service
// ============================================================================

export const DEFAULT_LEDGER_DIR = "migration-logs";

export interface LedgerOptions {
	/** Root of the entity storage tree. */
	readonly storageRoot: string;
	/** Ledger directory relative to `storageRoot`. */
	readonly ledgerDir?: string;
}

export interface RecordEntryOptions {
	readonly metadata: MigrationMetadata;
	readonly executedAt: Date;
	readonly diff: Option.Option<string>;
}

export interface MigrationLedgerShape {
	/** Absolute path of the ledger directory. */
	readonly root: string;
	readonly getApplied: () => Effect.Effect<ReadonlySet<string>>;
	readonly invalidateCache: () => Effect.Effect<void>;
	/** Catalog entries not yet applied, in catalog order. */
	readonly getPending: (
		catalog: ReadonlyArray<MigrationDescriptor>,
	) => Effect.Effect<ReadonlyArray<MigrationDescriptor>>;
	readonly isApplied: (
		descriptor: MigrationDescriptor,
	) => Effect.Effect<boolean>;
	/**
	 * Persist the applied-record for a completed run. Existing files for the
	 * same migration are overwritten. Does not touch the applied cache.
	 */
	readonly record: (
		descriptor: MigrationDescriptor,
		result: ExecutionResult,
		options: RecordEntryOptions,
	) => Effect.Effect<LedgerEntryPaths, LedgerWriteError>;
	readonly readEntry: (
		fullName: string,
	) => Effect.Effect<Option.Option<LedgerEntry>, LedgerDecodeError | StorageError>;
}

export class MigrationLedger extends Context.Tag("MigrationLedger")<
	MigrationLedger,
	MigrationLedgerShape
>() {}

// ============================================================================
// Formatting
// ============================================================================

const SEPARATOR = "=".repeat(80);

const formatTranscript = (
	fullName: string,
	result: ExecutionResult,
	executedAt: Date,
): string => {
	const header = [
		`Migration: ${fullName}`,
		`Executed at: ${executedAt.toISOString()}`,
		`Duration: ${result.durationSeconds.toFixed(1)}s`,
		"",
		SEPARATOR,
		"Execution Logs:",
		SEPARATOR,
		"",
	];
	return [...header, ...result.logs].map((line) => `${line}\n`).join("");
};

const toJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

// ============================================================================
// Construction
// ============================================================================

export const makeMigrationLedger = (
	options: LedgerOptions,
): Effect.Effect<MigrationLedgerShape, never, StorageAdapter> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const root = join(options.storageRoot, options.ledgerDir ?? DEFAULT_LEDGER_DIR);
		const cache = yield* Ref.make(Option.none<ReadonlySet<string>>());

		const scan: Effect.Effect<ReadonlySet<string>> = Effect.gen(function* () {
			yield* Effect.logDebug(`Checking migration logs in ${root}`);
			const rootExists = yield* storage.exists(root);
			if (!rootExists) {
				yield* Effect.logDebug(`Migration logs directory does not exist: ${root}`);
				return new Set<string>();
			}
			const applied = new Set<string>();
			for (const entry of yield* storage.list(root)) {
				if (entry.kind !== "directory") continue;
				const hasMetadata = yield* storage.exists(
					join(root, entry.name, LEDGER_FILES.metadata),
				);
				if (hasMetadata) {
					applied.add(entry.name);
				}
			}
			yield* Effect.logDebug(`Found ${applied.size} applied migrations in logs`);
			return applied;
		}).pipe(
			Effect.catchAll((error) =>
				Effect.logError(
					`Unexpected error checking migration logs: ${error.message}`,
				).pipe(Effect.as(new Set<string>())),
			),
		);

		const getApplied = () =>
			Effect.gen(function* () {
				const cached = yield* Ref.get(cache);
				if (Option.isSome(cached)) {
					return cached.value;
				}
				const applied = yield* scan;
				yield* Ref.set(cache, Option.some(applied));
				return applied;
			});

		const entryPaths = (fullName: string, hasDiff: boolean): LedgerEntryPaths => {
			const directory = join(root, fullName);
			return {
				directory,
				metadata: join(directory, LEDGER_FILES.metadata),
				changes: join(directory, LEDGER_FILES.changes),
				diff: hasDiff ? join(directory, LEDGER_FILES.diff) : null,
				logs: join(directory, LEDGER_FILES.logs),
			};
		};

		const record = (
			descriptor: MigrationDescriptor,
			result: ExecutionResult,
			recordOptions: RecordEntryOptions,
		): Effect.Effect<LedgerEntryPaths, LedgerWriteError> => {
			const name = descriptor.fullName;
			const paths = entryPaths(name, Option.isSome(recordOptions.diff));
			const changes: ChangeSummaryRecord = {
				entities_created: result.entitiesCreated,
				relationships_created: result.relationshipsCreated,
				versions_created: result.versionsCreated,
				summary: `Created ${result.entitiesCreated} entities and ${result.relationshipsCreated} relationships`,
			};
			const metadata: LedgerMetadataRecord = {
				migration_name: name,
				author: recordOptions.metadata.author,
				date: recordOptions.metadata.date,
				description: recordOptions.metadata.description,
				executed_at: recordOptions.executedAt.toISOString(),
				duration_seconds: result.durationSeconds,
				entities_created: result.entitiesCreated,
				relationships_created: result.relationshipsCreated,
				status: "completed",
				changes: {
					entities_created: result.entitiesCreated,
					relationships_created: result.relationshipsCreated,
					versions_created: result.versionsCreated,
					has_diff: Option.isSome(recordOptions.diff),
				},
			};

			// metadata.json goes last: it is the marker that flips the
			// migration to applied.
			return Effect.gen(function* () {
				yield* Effect.logInfo(`Storing migration log in ${paths.directory}`);
				yield* storage.makeDirectory(paths.directory);
				yield* storage.write(paths.changes, toJson(changes));
				if (paths.diff !== null && Option.isSome(recordOptions.diff)) {
					yield* storage.write(paths.diff, recordOptions.diff.value);
				} else {
					// A re-run replaces the whole entry, including an earlier diff.
					const staleDiff = join(paths.directory, LEDGER_FILES.diff);
					if (yield* storage.exists(staleDiff)) {
						yield* storage.remove(staleDiff);
					}
				}
				yield* storage.write(
					paths.logs,
					formatTranscript(name, result, recordOptions.executedAt),
				);
				yield* storage.write(paths.metadata, toJson(metadata));
				return paths;
			}).pipe(
				Effect.mapError(
					(error) =>
						new LedgerWriteError({
							migration: name,
							phase: "logging",
							path: error.path,
							message: `Failed to store migration log for ${name}: ${error.message}`,
							cause: error,
						}),
				),
			);
		};

		const decodeFile = <A, I>(
			fullName: string,
			path: string,
			schema: Schema.Schema<A, I>,
		): Effect.Effect<A, LedgerDecodeError | StorageError> =>
			Effect.gen(function* () {
				const raw = yield* storage.read(path);
				const json = yield* Effect.try({
					try: (): unknown => JSON.parse(raw),
					catch: (error) =>
						new LedgerDecodeError({
							migration: fullName,
							path,
							message: `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
						}),
				});
				return yield* Schema.decodeUnknown(schema)(json).pipe(
					Effect.mapError(
						(error) =>
							new LedgerDecodeError({
								migration: fullName,
								path,
								message: `Unexpected ledger record in ${path}: ${error.message}`,
							}),
					),
				);
			});

		const readEntry = (fullName: string) =>
			Effect.gen(function* () {
				const paths = entryPaths(fullName, false);
				const applied = yield* storage.exists(paths.metadata);
				if (!applied) {
					return Option.none<LedgerEntry>();
				}
				const metadata = yield* decodeFile(
					fullName,
					paths.metadata,
					LedgerMetadataRecord,
				);
				const hasChanges = yield* storage.exists(paths.changes);
				const changes = hasChanges
					? yield* decodeFile(fullName, paths.changes, ChangeSummaryRecord)
					: null;
				return Option.some<LedgerEntry>({
					directory: paths.directory,
					metadata,
					changes,
					hasDiff: metadata.changes.has_diff,
				});
			});

		return {
			root,
			getApplied,
			invalidateCache: () =>
				Ref.set(cache, Option.none()).pipe(
					Effect.zipRight(Effect.logDebug("Clearing applied migrations cache")),
				),
			getPending: (catalog) =>
				getApplied().pipe(
					Effect.map((applied) =>
						catalog.filter((migration) => !applied.has(migration.fullName)),
					),
				),
			isApplied: (descriptor) =>
				getApplied().pipe(Effect.map((applied) => applied.has(descriptor.fullName))),
			record,
			readEntry,
		};
	});

export const makeMigrationLedgerLayer = (
	options: LedgerOptions,
): Layer.Layer<MigrationLedger, never, StorageAdapter> =>
	Layer.effect(MigrationLedger, makeMigrationLedger(options));
