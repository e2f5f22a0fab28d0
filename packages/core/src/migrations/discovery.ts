/**
 * Migration discovery: turns a migrations root into an ordered catalog of
 * descriptors. Nothing is executed and the ledger is not consulted.
 */

import { join } from "node:path";
import { Effect, Either, Option } from "effect";
import { DiscoveryWarning } from "../errors/migration-errors.js";
import { StorageAdapter } from "../storage/storage-service.js";
import type { MigrationDescriptor } from "../types/migration-types.js";
import { findSyntaxError, scanMigrationMetadata } from "./metadata-scanner.js";
import {
	formatFullName,
	parseAuthoredDate,
	parseMigrationFolderName,
	validateMigrationNaming,
} from "./naming.js";

// ============================================================================
// Configuration
// ============================================================================

/**
 * Entry-script file names, in lookup order. The first one present wins.
 */
export const DEFAULT_ENTRY_SCRIPTS: ReadonlyArray<string> = [
	"migrate.ts",
	"run.ts",
];

/**
 * Build and tooling caches that can sit next to migration folders.
 */
const README_FILE = "README.md";

const IGNORED_FOLDERS = new Set(["node_modules", "dist", "__pycache__"]);

export interface DiscoveryOptions {
	readonly entryScripts?: ReadonlyArray<string>;
}

export interface MigrationCatalog {
	readonly migrations: ReadonlyArray<MigrationDescriptor>;
	readonly warnings: ReadonlyArray<DiscoveryWarning>;
}

const emptyCatalog: MigrationCatalog = { migrations: [], warnings: [] };

// ============================================================================
// Discovery
// ============================================================================

/**
 * Discover every valid migration under `migrationsRoot`, sorted by ordinal.
 *
 * A missing root yields an empty catalog. Folders with invalid names or no
 * entry script are left out and reported as warnings; unreadable metadata
 * and malformed dates leave the corresponding descriptor fields absent.
 */
export const discoverMigrations = (
	migrationsRoot: string,
	options: DiscoveryOptions = {},
): Effect.Effect<MigrationCatalog, never, StorageAdapter> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const entryScripts = options.entryScripts ?? DEFAULT_ENTRY_SCRIPTS;

		yield* Effect.logInfo(`Discovering migrations in ${migrationsRoot}`);

		const rootExists = yield* storage
			.exists(migrationsRoot)
			.pipe(Effect.orElseSucceed(() => false));
		if (!rootExists) {
			yield* Effect.logWarning(
				`Migrations directory does not exist: ${migrationsRoot}`,
			);
			return emptyCatalog;
		}

		const listing = yield* storage.list(migrationsRoot).pipe(Effect.either);
		if (Either.isLeft(listing)) {
			yield* Effect.logWarning(
				`Cannot list migrations directory ${migrationsRoot}: ${listing.left.message}`,
			);
			return emptyCatalog;
		}

		const migrations: MigrationDescriptor[] = [];
		const warnings: DiscoveryWarning[] = [];
		const warn = (warning: DiscoveryWarning) =>
			Effect.sync(() => warnings.push(warning)).pipe(
				Effect.zipRight(Effect.logWarning(warning.message)),
			);

		for (const entry of listing.right) {
			if (entry.kind !== "directory") continue;
			const folder = entry.name;
			if (folder.startsWith(".") || IGNORED_FOLDERS.has(folder)) continue;

			const naming = validateMigrationNaming(folder);
			const parsed = parseMigrationFolderName(folder);
			if (!naming.isValid || Option.isNone(parsed)) {
				yield* warn(
					new DiscoveryWarning({
						folder,
						reason: "invalid-name",
						message: `Skipping invalid migration folder '${folder}': ${naming.errors.join(", ")}`,
					}),
				);
				continue;
			}

			const location = join(migrationsRoot, folder);
			let entryScript: string | undefined;
			for (const candidate of entryScripts) {
				const candidatePath = join(location, candidate);
				const present = yield* storage
					.exists(candidatePath)
					.pipe(Effect.orElseSucceed(() => false));
				if (present) {
					entryScript = candidatePath;
					break;
				}
			}
			if (entryScript === undefined) {
				yield* warn(
					new DiscoveryWarning({
						folder,
						reason: "missing-entry-script",
						message: `Skipping migration folder '${folder}': no ${entryScripts.join(" or ")} found`,
					}),
				);
				continue;
			}

			const source = yield* storage.read(entryScript).pipe(Effect.either);
			const syntaxError = Either.isRight(source)
				? findSyntaxError(source.right, entryScript)
				: Option.none<string>();
			let author: string | undefined;
			let authoredDate: string | undefined;
			let description: string | undefined;
			if (Either.isLeft(source)) {
				yield* warn(
					new DiscoveryWarning({
						folder,
						reason: "unreadable-metadata",
						message: `Failed to load metadata from ${entryScript}: ${source.left.message}`,
					}),
				);
			} else if (Option.isSome(syntaxError)) {
				yield* warn(
					new DiscoveryWarning({
						folder,
						reason: "unreadable-metadata",
						message: `Failed to parse metadata from ${entryScript}: ${syntaxError.value}`,
					}),
				);
			} else {
				const scanned = scanMigrationMetadata(source.right, entryScript);
				author = scanned.author;
				description = scanned.description;
				if (scanned.date !== undefined) {
					const date = parseAuthoredDate(scanned.date);
					if (Option.isSome(date)) {
						authoredDate = date.value;
					} else {
						yield* warn(
							new DiscoveryWarning({
								folder,
								reason: "invalid-date",
								message: `Invalid date format in ${entryScript}: ${scanned.date}`,
							}),
						);
					}
				}
			}

			const readmePath = join(location, README_FILE);
			const hasReadme = yield* storage
				.exists(readmePath)
				.pipe(Effect.orElseSucceed(() => false));

			const { ordinal, slug } = parsed.value;
			const descriptor: MigrationDescriptor = {
				ordinal,
				slug,
				fullName: formatFullName(ordinal, slug),
				location,
				entryScript,
				author,
				authoredDate,
				description,
				readme: hasReadme ? readmePath : undefined,
			};
			migrations.push(descriptor);
			yield* Effect.logDebug(`Discovered migration: ${descriptor.fullName}`);
		}

		// Array.prototype.sort is stable: equal ordinals keep listing order.
		migrations.sort((a, b) => a.ordinal - b.ordinal);

		yield* Effect.logInfo(`Discovered ${migrations.length} migrations`);
		return { migrations, warnings };
	});

/**
 * Look up a migration by its full name (e.g. `000-initial-locations`).
 */
export const findMigration = (
	catalog: MigrationCatalog,
	fullName: string,
): Option.Option<MigrationDescriptor> =>
	Option.fromNullable(
		catalog.migrations.find((migration) => migration.fullName === fullName),
	);
