import { Data } from "effect";

// ============================================================================
// Collaborator Errors
// ============================================================================

/**
 * A call into an external collaborator (publication, search, scraping,
 * database) failed. The engine never retries these.
 */
export class CollaboratorError extends Data.TaggedError("CollaboratorError")<{
	readonly collaborator: "publication" | "search" | "scraping" | "database";
	readonly operation: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * A migration asked its context for a file that is missing or malformed.
 */
export class ContextFileError extends Data.TaggedError("ContextFileError")<{
	readonly path: string;
	readonly reason: "not-found" | "parse";
	readonly message: string;
	readonly cause?: unknown;
}> {}
