/**
 * Convenience wiring that eliminates manual layer assembly for hosts that
 * keep migrations and entity storage on the local filesystem.
 */

import {
	type Collaborators,
	DEFAULT_LEDGER_DIR,
	discoverMigrations,
	type DiscoveryOptions,
	type ExecutionResult,
	type MigrationCatalog,
	type MigrationEngineServices,
	makeMigrationLedgerLayer,
	runPendingMigrations,
	makeUntrackedStorageStateLayer,
	type RunMigrationsOptions,
} from "@civic-ledger/core";
import { Effect, Layer } from "effect";
import { makeGitStorageStateLayer, type GitRunner } from "./git-storage-state-layer.js";
import { makeFileEntityStoreLayer, UnconfiguredScrapingLayer } from "./file-entity-store.js";
import { DynamicImportModuleSourceLayer } from "./module-import-layer.js";
import { NodeStorageLayer } from "./node-adapter-layer.js";
import { countVersionRecordFiles } from "./version-records.js";

export interface NodeMigrationConfig {
	/** Root of the entity storage tree (and of the git-tracked area). */
	readonly storageRoot: string;
	/** `"git"` gates runs on a clean work tree; `"none"` skips the check. */
	readonly stateTracking?: "git" | "none";
	/** Ledger directory relative to `storageRoot`. */
	readonly ledgerDir?: string;
	readonly runGit?: GitRunner;
	/** Replaces the file-backed collaborators, e.g. with remote services. */
	readonly collaborators?: Layer.Layer<Collaborators>;
}

/**
 * Build every service the engine needs from a filesystem configuration.
 */
export const makeNodeMigrationLayer = (
	config: NodeMigrationConfig,
): Layer.Layer<MigrationEngineServices> => {
	const stateLayer =
		(config.stateTracking ?? "git") === "git"
			? makeGitStorageStateLayer({ root: config.storageRoot, runGit: config.runGit })
			: makeUntrackedStorageStateLayer({
					countVersionRecords: () => countVersionRecordFiles(config.storageRoot),
				});

	const collaboratorsLayer =
		config.collaborators ??
		Layer.merge(
			makeFileEntityStoreLayer(config.storageRoot),
			UnconfiguredScrapingLayer,
		).pipe(Layer.provide(NodeStorageLayer));

	const ledgerLayer = makeMigrationLedgerLayer({
		storageRoot: config.storageRoot,
		ledgerDir: config.ledgerDir ?? DEFAULT_LEDGER_DIR,
	}).pipe(Layer.provide(NodeStorageLayer));

	return Layer.mergeAll(
		NodeStorageLayer,
		stateLayer,
		ledgerLayer,
		DynamicImportModuleSourceLayer,
		collaboratorsLayer,
	);
};

/**
 * Discover migrations under `migrationsDir` and run every pending one.
 */
export const runNodeMigrations = (
	migrationsDir: string,
	config: NodeMigrationConfig,
	options: RunMigrationsOptions & DiscoveryOptions = {},
): Effect.Effect<{
	readonly catalog: MigrationCatalog;
	readonly results: ReadonlyArray<ExecutionResult>;
}> =>
	Effect.gen(function* () {
		const catalog = yield* discoverMigrations(migrationsDir, {
			entryScripts: options.entryScripts,
		});
		const results = yield* runPendingMigrations(catalog.migrations, options);
		return { catalog, results };
	}).pipe(Effect.provide(makeNodeMigrationLayer(config)));
