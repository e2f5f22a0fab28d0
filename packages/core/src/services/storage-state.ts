import { Context, Effect, Layer, Option } from "effect";
import type { StateCheckError } from "../errors/storage-errors.js";

// ============================================================================
// StorageState Effect Service
// ============================================================================

/**
 * Questions the engine asks about the storage tree as a whole, answered by
 * whatever tracks its durable checkpoints (version control, or nothing).
 */
export interface StorageStateShape {
	/** True when nothing has changed since the last durable checkpoint. */
	readonly isClean: () => Effect.Effect<boolean, StateCheckError>;
	/** Changes since the last checkpoint, or none when diffs are unsupported. */
	readonly captureDiff: () => Effect.Effect<
		Option.Option<string>,
		StateCheckError
	>;
	/** Number of version records stored anywhere under the storage root. */
	readonly countVersionRecords: () => Effect.Effect<number, StateCheckError>;
	/** Make the current state the new durable checkpoint. */
	readonly checkpoint: (message: string) => Effect.Effect<void, StateCheckError>;
}

export class StorageState extends Context.Tag("StorageState")<
	StorageState,
	StorageStateShape
>() {}

// ============================================================================
// Layers
// ============================================================================

export interface UntrackedStorageStateOptions {
	/** Counts version records in the storage tree; zero when omitted. */
	readonly countVersionRecords?: StorageStateShape["countVersionRecords"];
}

/**
 * For storage trees with no checkpoint tracking: always clean, never a diff,
 * checkpoints are no-ops. Version records are still counted when a counter
 * is given.
 */
export const makeUntrackedStorageStateLayer = (
	options: UntrackedStorageStateOptions = {},
): Layer.Layer<StorageState> =>
	Layer.succeed(StorageState, {
		isClean: () => Effect.succeed(true),
		captureDiff: () => Effect.succeed(Option.none()),
		countVersionRecords: options.countVersionRecords ?? (() => Effect.succeed(0)),
		checkpoint: () => Effect.void,
	});

export const UntrackedStorageStateLayer: Layer.Layer<StorageState> =
	makeUntrackedStorageStateLayer();

export interface StaticStorageStateOptions {
	readonly isClean?: () => boolean;
	readonly diff?: () => string | undefined;
	readonly versionRecords?: () => number;
	readonly checkpoint?: (message: string) => void;
}

/**
 * Storage state answered by plain callbacks. Intended for tests.
 */
export const makeStaticStorageStateLayer = (
	options: StaticStorageStateOptions = {},
): Layer.Layer<StorageState> =>
	Layer.succeed(StorageState, {
		isClean: () => Effect.sync(() => options.isClean?.() ?? true),
		captureDiff: () =>
			Effect.sync(() => Option.fromNullable(options.diff?.())),
		countVersionRecords: () =>
			Effect.sync(() => options.versionRecords?.() ?? 0),
		checkpoint: (message) => Effect.sync(() => options.checkpoint?.(message)),
	});
