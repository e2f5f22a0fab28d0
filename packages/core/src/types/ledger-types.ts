import { Schema } from "effect";

// ============================================================================
// Ledger Records (on-disk layout, snake_case keys)
// ============================================================================

export const LedgerChangeBlock = Schema.Struct({
	entities_created: Schema.Number,
	relationships_created: Schema.Number,
	versions_created: Schema.Number,
	has_diff: Schema.Boolean,
});

/**
 * `metadata.json`; its presence is what marks a migration as applied.
 */
export const LedgerMetadataRecord = Schema.Struct({
	migration_name: Schema.String,
	author: Schema.NullOr(Schema.String),
	date: Schema.NullOr(Schema.String),
	description: Schema.NullOr(Schema.String),
	executed_at: Schema.String,
	duration_seconds: Schema.Number,
	entities_created: Schema.Number,
	relationships_created: Schema.Number,
	status: Schema.Literal("completed", "failed"),
	changes: LedgerChangeBlock,
});

export type LedgerMetadataRecord = typeof LedgerMetadataRecord.Type;

/**
 * `changes.json`
 */
export const ChangeSummaryRecord = Schema.Struct({
	entities_created: Schema.Number,
	relationships_created: Schema.Number,
	versions_created: Schema.Number,
	summary: Schema.String,
});

export type ChangeSummaryRecord = typeof ChangeSummaryRecord.Type;

/**
 * File names inside one ledger entry directory.
 */
export const LEDGER_FILES = {
	metadata: "metadata.json",
	changes: "changes.json",
	diff: "changes.diff",
	logs: "logs.txt",
} as const;

export interface LedgerEntryPaths {
	readonly directory: string;
	readonly metadata: string;
	readonly changes: string;
	readonly diff: string | null;
	readonly logs: string;
}

/**
 * A decoded ledger entry, as shown by `migrate show`.
 */
export interface LedgerEntry {
	readonly directory: string;
	readonly metadata: LedgerMetadataRecord;
	readonly changes: ChangeSummaryRecord | null;
	readonly hasDiff: boolean;
}
