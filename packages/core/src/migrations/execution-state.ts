import { Effect } from "effect";
import type {
	ExecutionResult,
	MigrationDescriptor,
	MigrationStatus,
} from "../types/migration-types.js";

// ============================================================================
// Status Transitions
// ============================================================================

/**
 * Legal status moves. `completed -> failed` exists only for the ledger-write
 * downgrade; `skipped` and `failed` are final.
 */
const TRANSITIONS: Readonly<Record<MigrationStatus, ReadonlyArray<MigrationStatus>>> = {
	pending: ["running", "skipped", "failed"],
	running: ["completed", "failed"],
	completed: ["failed"],
	skipped: [],
	failed: [],
};

export const canTransition = (
	from: MigrationStatus,
	to: MigrationStatus,
): boolean => TRANSITIONS[from].includes(to);

export const isTerminal = (status: MigrationStatus): boolean =>
	status === "completed" || status === "skipped" || status === "failed";

export const pendingResult = (
	migration: MigrationDescriptor,
): ExecutionResult => ({
	migration,
	status: "pending",
	durationSeconds: 0,
	entitiesCreated: 0,
	relationshipsCreated: 0,
	versionsCreated: 0,
	diffCaptured: false,
	logs: [],
});

/**
 * Move `result` to `status`, merging `patch`. An illegal move is a defect in
 * the engine, not a migration failure.
 */
export const advance = (
	result: ExecutionResult,
	status: MigrationStatus,
	patch: Partial<Omit<ExecutionResult, "status" | "migration">> = {},
): Effect.Effect<ExecutionResult> =>
	canTransition(result.status, status)
		? Effect.succeed({ ...result, ...patch, status })
		: Effect.dieMessage(
				`Illegal migration status transition for ${result.migration.fullName}: ${result.status} -> ${status}`,
			);
