/**
 * Main entry point for the civic-ledger migration core.
 *
 * Exports the Effect-based API: typed errors, discovery, the applied-migration
 * ledger, the loader, the execution engine, and the service tags a host
 * provides (storage, storage state, collaborators).
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

// Migration errors
export {
	ContractError,
	DiscoveryWarning,
	LedgerDecodeError,
	LedgerWriteError,
	LoadError,
	MigrationExecutionError,
	PreconditionError,
} from "./errors/migration-errors.js";

export type {
	DiscoveryWarningReason,
	MigrationFailure,
	MigrationPhase,
} from "./errors/migration-errors.js";

// Storage errors
export { StateCheckError, StorageError } from "./errors/storage-errors.js";

export type { PersistenceError } from "./errors/storage-errors.js";

// Collaborator errors
export {
	CollaboratorError,
	ContextFileError,
} from "./errors/collaborator-errors.js";

// ============================================================================
// Domain Types
// ============================================================================

export type {
	Author,
	Entity,
	EntityType,
	Relationship,
} from "./types/entity-types.js";

export type {
	BatchSummary,
	ExecutionResult,
	LoadedMigration,
	MigrationDefinition,
	MigrationDescriptor,
	MigrationEntryPoint,
	MigrationMetadata,
	MigrationStatus,
	RunMigrationOptions,
	RunMigrationsOptions,
} from "./types/migration-types.js";

export type {
	MigrationContext,
	PromiseClient,
	ReadCsvOptions,
} from "./types/context-types.js";

export {
	ChangeSummaryRecord,
	LEDGER_FILES,
	LedgerChangeBlock,
	LedgerMetadataRecord,
} from "./types/ledger-types.js";

export type { LedgerEntry, LedgerEntryPaths } from "./types/ledger-types.js";

// ============================================================================
// Storage Service
// ============================================================================

export { StorageAdapter } from "./storage/storage-service.js";

export type {
	DirectoryEntry,
	StorageAdapterShape,
} from "./storage/storage-service.js";

export {
	InMemoryStorageLayer,
	makeInMemoryStorageLayer,
} from "./storage/in-memory-adapter-layer.js";

// ============================================================================
// Storage State & Collaborators
// ============================================================================

export {
	makeStaticStorageStateLayer,
	makeUntrackedStorageStateLayer,
	StorageState,
	UntrackedStorageStateLayer,
} from "./services/storage-state.js";

export type {
	StaticStorageStateOptions,
	StorageStateShape,
	UntrackedStorageStateOptions,
} from "./services/storage-state.js";

export {
	EntityDatabase,
	PublicationService,
	ScrapingService,
	SearchService,
} from "./services/collaborators.js";

export type {
	Collaborators,
	CreateEntityInput,
	CreateRelationshipInput,
	EntityDatabaseShape,
	ExtractStructuredDataInput,
	GenerateTextInput,
	ListEntitiesQuery,
	ListRelationshipsQuery,
	PublicationServiceShape,
	ScrapingServiceShape,
	SearchQuery,
	SearchServiceShape,
	UpdateEntityInput,
} from "./services/collaborators.js";

export {
	makeInMemoryCollaboratorsLayer,
	makeInMemoryEntityStore,
} from "./services/in-memory-collaborators.js";

export type {
	InMemoryEntityStore,
	InMemoryVersionRecord,
} from "./services/in-memory-collaborators.js";

// ============================================================================
// Migrations
// ============================================================================

export { defineMigration } from "./migrations/define-migration.js";

export {
	formatFullName,
	MIGRATION_FOLDER_PATTERN,
	parseAuthoredDate,
	parseMigrationFolderName,
	validateMigrationNaming,
} from "./migrations/naming.js";

export type { NamingValidationResult } from "./migrations/naming.js";

export {
	findSyntaxError,
	scanMigrationMetadata,
} from "./migrations/metadata-scanner.js";

export type { ScannedMetadata } from "./migrations/metadata-scanner.js";

export {
	DEFAULT_ENTRY_SCRIPTS,
	discoverMigrations,
	findMigration,
} from "./migrations/discovery.js";

export type {
	DiscoveryOptions,
	MigrationCatalog,
} from "./migrations/discovery.js";

export {
	DEFAULT_LEDGER_DIR,
	makeMigrationLedger,
	makeMigrationLedgerLayer,
	MigrationLedger,
} from "./migrations/ledger.js";

export type {
	LedgerOptions,
	MigrationLedgerShape,
	RecordEntryOptions,
} from "./migrations/ledger.js";

export {
	describeSyntaxError,
	loadMigration,
	makeStaticModuleSourceLayer,
	MigrationModuleSource,
	toLoadError,
	validateMigrationModule,
} from "./migrations/loader.js";

export type {
	MigrationModuleRegistry,
	MigrationModuleSourceShape,
} from "./migrations/loader.js";

export { makeMigrationContext } from "./migrations/context.js";

export { parseCsv, parseCsvRows } from "./migrations/csv.js";

export {
	advance,
	canTransition,
	isTerminal,
	pendingResult,
} from "./migrations/execution-state.js";

export {
	COUNT_LIMIT,
	runMigration,
	runMigrations,
	runPendingMigrations,
	summarizeResults,
} from "./migrations/engine.js";

export type { MigrationEngineServices } from "./migrations/engine.js";
