// ============================================================================
// Migration Errors (re-exported from migration-errors.ts)
// ============================================================================

export type {
	DiscoveryWarningReason,
	MigrationFailure,
	MigrationPhase,
} from "./migration-errors.js";
export {
	ContractError,
	DiscoveryWarning,
	LedgerDecodeError,
	LedgerWriteError,
	LoadError,
	MigrationExecutionError,
	PreconditionError,
} from "./migration-errors.js";

// ============================================================================
// Storage Errors (re-exported from storage-errors.ts)
// ============================================================================

export type { PersistenceError } from "./storage-errors.js";
export { StateCheckError, StorageError } from "./storage-errors.js";

// ============================================================================
// Collaborator Errors (re-exported from collaborator-errors.ts)
// ============================================================================

export { CollaboratorError, ContextFileError } from "./collaborator-errors.js";
