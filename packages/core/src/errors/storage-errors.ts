import { Data } from "effect"

// ============================================================================
// Effect TaggedError Storage Error Types
// ============================================================================

export class StorageError extends Data.TaggedError("StorageError")<{
	readonly path: string
	readonly operation: "read" | "write" | "list" | "delete" | "mkdir"
	readonly message: string
	readonly cause?: unknown
}> {}

/**
 * The external state tracker (version control) could not answer a query.
 */
export class StateCheckError extends Data.TaggedError("StateCheckError")<{
	readonly root: string
	readonly operation: "status" | "diff" | "count" | "commit"
	readonly message: string
	readonly cause?: unknown
}> {}

// ============================================================================
// Storage Error Union
// ============================================================================

export type PersistenceError = StorageError | StateCheckError
