import { Context, type Effect } from "effect";
import type { StorageError } from "../errors/storage-errors.js";

// ============================================================================
// StorageAdapter Effect Service
// ============================================================================

export interface DirectoryEntry {
	readonly name: string;
	readonly kind: "file" | "directory";
}

export interface StorageAdapterShape {
	readonly read: (path: string) => Effect.Effect<string, StorageError>;
	/** Writes the file, creating missing parent directories. */
	readonly write: (path: string, data: string) => Effect.Effect<void, StorageError>;
	readonly exists: (path: string) => Effect.Effect<boolean, StorageError>;
	/** Immediate children of a directory, in listing order. */
	readonly list: (
		path: string,
	) => Effect.Effect<ReadonlyArray<DirectoryEntry>, StorageError>;
	/** Creates the directory and any missing parents. */
	readonly makeDirectory: (path: string) => Effect.Effect<void, StorageError>;
	readonly remove: (path: string) => Effect.Effect<void, StorageError>;
}

export class StorageAdapter extends Context.Tag("StorageAdapter")<
	StorageAdapter,
	StorageAdapterShape
>() {}
