/**
 * Shared fixtures for migration tests: an in-memory storage tree, an
 * in-memory entity store and a static module registry wired into one layer.
 */

import { Effect, Layer } from "effect";
import {
	type InMemoryEntityStore,
	makeInMemoryCollaboratorsLayer,
	makeInMemoryEntityStore,
} from "../../src/services/in-memory-collaborators.js";
import {
	makeStaticStorageStateLayer,
	type StorageState,
} from "../../src/services/storage-state.js";
import { makeInMemoryStorageLayer } from "../../src/storage/in-memory-adapter-layer.js";
import { defineMigration } from "../../src/migrations/define-migration.js";
import type { MigrationEngineServices } from "../../src/migrations/engine.js";
import { makeMigrationLedgerLayer } from "../../src/migrations/ledger.js";
import {
	type MigrationModuleRegistry,
	makeStaticModuleSourceLayer,
} from "../../src/migrations/loader.js";
import type { MigrationContext } from "../../src/types/context-types.js";
import type {
	MigrationDescriptor,
	MigrationMetadata,
} from "../../src/types/migration-types.js";

export const MIGRATIONS_ROOT = "/repo/migrations";
export const STORAGE_ROOT = "/repo/data";
export const LEDGER_ROOT = `${STORAGE_ROOT}/migration-logs`;

export const descriptorFor = (fullName: string): MigrationDescriptor => {
	const ordinal = Number.parseInt(fullName.slice(0, 3), 10);
	const location = `${MIGRATIONS_ROOT}/${fullName}`;
	return {
		ordinal,
		slug: fullName.slice(4),
		fullName,
		location,
		entryScript: `${location}/migrate.ts`,
	};
};

export const testMetadata: MigrationMetadata = {
	author: "test-author",
	date: "2024-01-15",
	description: "Test migration",
};

/**
 * A module namespace whose default export is a valid migration.
 */
export const migrationModule = (
	migrate: (context: MigrationContext) => Promise<void>,
	metadata: MigrationMetadata = testMetadata,
) => ({ default: defineMigration({ ...metadata, migrate }) });

export const entityData = (slug: string) => ({
	slug,
	names: [{ kind: "PRIMARY", name: { en: { full: slug } } }],
});

export interface TestEnvironmentOptions {
	readonly registry?: MigrationModuleRegistry;
	readonly isClean?: () => boolean;
	readonly diff?: () => string | undefined;
	readonly checkpoint?: (message: string) => void;
	/** Replaces the callback-driven storage state entirely. */
	readonly storageState?: Layer.Layer<StorageState>;
}

export interface TestEnvironment {
	readonly files: Map<string, string>;
	readonly directories: Set<string>;
	readonly store: InMemoryEntityStore;
	readonly layer: Layer.Layer<MigrationEngineServices>;
	readonly run: <A, E>(
		effect: Effect.Effect<A, E, MigrationEngineServices>,
	) => Promise<A>;
}

export const makeTestEnvironment = (
	options: TestEnvironmentOptions = {},
): TestEnvironment => {
	const files = new Map<string, string>();
	const directories = new Set<string>();
	const store = makeInMemoryEntityStore();
	const storageLayer = makeInMemoryStorageLayer(files, directories);
	const layer = Layer.mergeAll(
		storageLayer,
		makeMigrationLedgerLayer({ storageRoot: STORAGE_ROOT }).pipe(
			Layer.provide(storageLayer),
		),
		makeStaticModuleSourceLayer(options.registry ?? {}),
		options.storageState ??
			makeStaticStorageStateLayer({
				isClean: options.isClean,
				diff: options.diff,
				checkpoint: options.checkpoint,
				versionRecords: () => store.versions.length,
			}),
		makeInMemoryCollaboratorsLayer(store),
	);
	return {
		files,
		directories,
		store,
		layer,
		run: (effect) => Effect.runPromise(Effect.provide(effect, layer)),
	};
};
