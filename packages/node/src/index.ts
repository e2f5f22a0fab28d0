/**
 * @civic-ledger/node - Node.js hosting for the migration subsystem
 *
 * Re-exports everything from @civic-ledger/core plus filesystem storage,
 * git-backed storage state, on-disk module loading and the JSON entity store.
 */

// Re-export everything from core
export * from "@civic-ledger/core";
// Convenience wiring (config-driven, no manual layer assembly)
export {
	makeNodeMigrationLayer,
	runNodeMigrations,
} from "./convenience.js";
export type { NodeMigrationConfig } from "./convenience.js";
export {
	makeFileEntityStoreLayer,
	UnconfiguredScrapingLayer,
} from "./file-entity-store.js";
export {
	execaGitRunner,
	makeGitStorageStateLayer,
} from "./git-storage-state-layer.js";
export type {
	GitCommandResult,
	GitRunner,
	GitStorageStateConfig,
} from "./git-storage-state-layer.js";
export { DynamicImportModuleSourceLayer } from "./module-import-layer.js";
export type { NodeAdapterConfig } from "./node-adapter-layer.js";
export {
	countVersionRecordFiles,
	DEFAULT_VERSION_PATTERN,
} from "./version-records.js";
// Node.js storage adapter
export {
	makeNodeStorageLayer,
	NodeStorageLayer,
} from "./node-adapter-layer.js";
