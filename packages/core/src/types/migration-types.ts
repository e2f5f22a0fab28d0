import type { MigrationFailure } from "../errors/migration-errors.js";
import type { MigrationContext } from "./context-types.js";

// ============================================================================
// Migration Descriptor
// ============================================================================

/**
 * Static identity of one migration folder, produced by discovery without
 * executing anything. Metadata fields are absent when the entry script does
 * not declare them (or declares an unparseable date).
 */
export interface MigrationDescriptor {
	/** Numeric prefix of the folder; execution order is ascending. */
	readonly ordinal: number;
	/** Kebab-case name after the prefix. */
	readonly slug: string;
	/** `{ordinal:03d}-{slug}`, unique across the catalog. */
	readonly fullName: string;
	/** Absolute path of the migration folder. */
	readonly location: string;
	/** Absolute path of the entry script inside `location`. */
	readonly entryScript: string;
	readonly author?: string;
	/** Calendar date in `YYYY-MM-DD` form. */
	readonly authoredDate?: string;
	readonly description?: string;
	/** Absolute path of a `README.md` beside the entry script, when present. */
	readonly readme?: string;
}

// ============================================================================
// Migration Declaration
// ============================================================================

export interface MigrationMetadata {
	readonly author: string;
	/** `YYYY-MM-DD` */
	readonly date: string;
	readonly description: string;
}

/**
 * The function a migration exposes. It must be declared `async`.
 */
export type MigrationEntryPoint = (context: MigrationContext) => Promise<void>;

/**
 * What an entry script default-exports (see `defineMigration`).
 */
export interface MigrationDefinition extends MigrationMetadata {
	readonly migrate: MigrationEntryPoint;
}

/**
 * A validated, ready-to-run migration.
 */
export interface LoadedMigration {
	readonly descriptor: MigrationDescriptor;
	readonly metadata: MigrationMetadata;
	readonly entryPoint: MigrationEntryPoint;
}

// ============================================================================
// Execution Results
// ============================================================================

export type MigrationStatus =
	| "pending"
	| "running"
	| "completed"
	| "skipped"
	| "failed";

/**
 * Outcome of one `runMigration` attempt.
 *
 * Created as `pending`; `error` is present iff `status` is `failed`. Deltas are
 * after-minus-before counts and may be negative when a migration removes more
 * records than it adds.
 */
export interface ExecutionResult {
	readonly migration: MigrationDescriptor;
	readonly status: MigrationStatus;
	readonly durationSeconds: number;
	readonly entitiesCreated: number;
	readonly relationshipsCreated: number;
	readonly versionsCreated: number;
	readonly diffCaptured: boolean;
	readonly error?: MigrationFailure;
	readonly logs: ReadonlyArray<string>;
}

export interface RunMigrationOptions {
	/** Run the body but do not record a ledger entry. Defaults to `true`. */
	readonly dryRun?: boolean;
	/** Record a ledger entry after a successful run. Defaults to `true`. */
	readonly autoCommit?: boolean;
	/** Re-run a migration the ledger already lists. Defaults to `false`. */
	readonly force?: boolean;
}

export interface RunMigrationsOptions {
	/** Defaults to `false`. */
	readonly dryRun?: boolean;
	/** Defaults to `true`. */
	readonly autoCommit?: boolean;
	/** Halt after the first failed migration. Defaults to `true`. */
	readonly stopOnFailure?: boolean;
}

export interface BatchSummary {
	readonly total: number;
	readonly completed: number;
	readonly skipped: number;
	readonly failed: number;
}
