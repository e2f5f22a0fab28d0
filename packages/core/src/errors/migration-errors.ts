import { Data } from "effect";

// ============================================================================
// Migration Phases
// ============================================================================

/**
 * The stage of a migration run at which a failure surfaced.
 */
export type MigrationPhase = "load" | "precondition" | "execution" | "logging";

// ============================================================================
// Discovery Warnings (non-fatal)
// ============================================================================

export type DiscoveryWarningReason =
	| "invalid-name"
	| "missing-entry-script"
	| "invalid-date"
	| "unreadable-metadata";

/**
 * A problem found while cataloging a migrations root. The affected folder is
 * either excluded (naming, entry script) or cataloged with partial
 * metadata (dates, unreadable metadata); discovery itself never fails.
 */
export class DiscoveryWarning extends Data.TaggedClass("DiscoveryWarning")<{
	readonly folder: string;
	readonly reason: DiscoveryWarningReason;
	readonly message: string;
}> {}

// ============================================================================
// Migration Failures
// ============================================================================

/**
 * The entry script could not be loaded: missing file, syntax error, or an
 * exception thrown while the module body was evaluated.
 */
export class LoadError extends Data.TaggedError("LoadError")<{
	readonly migration: string;
	readonly phase: "load";
	readonly scriptPath: string;
	readonly reason: "missing-script" | "syntax-error" | "evaluation-error";
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * The entry script loaded but does not satisfy the migration contract.
 * `missingFields` lists every absent metadata field when the reason is
 * `missing-metadata`.
 */
export class ContractError extends Data.TaggedError("ContractError")<{
	readonly migration: string;
	readonly phase: "load";
	readonly reason:
		| "missing-declaration"
		| "missing-entry-point"
		| "not-callable"
		| "not-async"
		| "missing-metadata"
		| "invalid-date";
	readonly missingFields: ReadonlyArray<string>;
	readonly message: string;
}> {}

/**
 * The storage tree is not in a state a migration may start from.
 */
export class PreconditionError extends Data.TaggedError("PreconditionError")<{
	readonly migration: string;
	readonly phase: "precondition";
	readonly reason: "uncommitted-changes" | "state-check-failed";
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * The migration body threw or rejected. `trace` holds the stack text.
 */
export class MigrationExecutionError extends Data.TaggedError(
	"MigrationExecutionError",
)<{
	readonly migration: string;
	readonly phase: "execution";
	readonly message: string;
	readonly trace: string;
	readonly cause?: unknown;
}> {}

/**
 * The applied-record for a logically successful run could not be persisted.
 */
export class LedgerWriteError extends Data.TaggedError("LedgerWriteError")<{
	readonly migration: string;
	readonly phase: "logging";
	readonly path: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * A stored ledger record exists but does not match the expected layout.
 */
export class LedgerDecodeError extends Data.TaggedError("LedgerDecodeError")<{
	readonly migration: string;
	readonly path: string;
	readonly message: string;
}> {}

// ============================================================================
// Migration Failure Union
// ============================================================================

export type MigrationFailure =
	| LoadError
	| ContractError
	| PreconditionError
	| MigrationExecutionError
	| LedgerWriteError;
