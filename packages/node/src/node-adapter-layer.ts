/**
 * Node.js filesystem implementation of StorageAdapter as an Effect Layer.
 * Provides atomic writes (temp file + rename) and retry with exponential
 * backoff for transient failures.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import {
	type DirectoryEntry,
	StorageAdapter,
	type StorageAdapterShape,
	StorageError,
} from "@civic-ledger/core";
import { Effect, Layer, Schedule } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeAdapterConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultConfig: Required<NodeAdapterConfig> = {
	maxRetries: 3,
	baseDelay: 100,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// Helpers
// ============================================================================

const errorCode = (error: unknown): string | undefined =>
	error instanceof Error && "code" in error && typeof error.code === "string"
		? error.code
		: undefined;

/**
 * Errors that retrying cannot fix.
 */
const PERMANENT_CODES = new Set([
	"ENOENT",
	"ENOTDIR",
	"EISDIR",
	"EEXIST",
	"EACCES",
]);

const isTransient = (error: StorageError): boolean => {
	const code = errorCode(error.cause);
	return code === undefined || !PERMANENT_CODES.has(code);
};

const toStorageError = (
	path: string,
	operation: StorageError["operation"],
	error: unknown,
): StorageError =>
	new StorageError({
		path,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const retryPolicy = (config: Required<NodeAdapterConfig>) =>
	Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	);

const withRetry =
	(config: Required<NodeAdapterConfig>) =>
	<A>(effect: Effect.Effect<A, StorageError>): Effect.Effect<A, StorageError> =>
		effect.pipe(
			Effect.retry({ schedule: retryPolicy(config), while: isTransient }),
		);

// ============================================================================
// Storage operations
// ============================================================================

const makeRead =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<string, StorageError> =>
		Effect.tryPromise({
			try: () => fs.readFile(path, "utf-8"),
			catch: (error) => toStorageError(path, "read", error),
		}).pipe(withRetry(config));

const makeDirectory =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<void, StorageError> =>
		Effect.tryPromise({
			try: () => fs.mkdir(path, { recursive: true, mode: config.dirMode }),
			catch: (error) => toStorageError(path, "mkdir", error),
		}).pipe(Effect.asVoid, withRetry(config));

const makeWrite =
	(config: Required<NodeAdapterConfig>) =>
	(path: string, data: string): Effect.Effect<void, StorageError> => {
		const tempPath = `${path}.tmp.${randomBytes(8).toString("hex")}`;

		const ensureParentDir = Effect.tryPromise({
			try: () =>
				fs.mkdir(dirname(path), { recursive: true, mode: config.dirMode }),
			catch: (error) => toStorageError(dirname(path), "write", error),
		}).pipe(Effect.asVoid);

		const writeAndRename = Effect.tryPromise({
			try: () => fs.writeFile(tempPath, data, { mode: config.fileMode }),
			catch: (error) => toStorageError(path, "write", error),
		}).pipe(
			Effect.andThen(
				Effect.tryPromise({
					try: () => fs.rename(tempPath, path),
					catch: (error) => toStorageError(path, "write", error),
				}),
			),
			Effect.catchAll((error) =>
				Effect.tryPromise({
					try: () => fs.unlink(tempPath),
					catch: () => error,
				}).pipe(Effect.ignore, Effect.andThen(Effect.fail(error))),
			),
		);

		return ensureParentDir.pipe(
			Effect.andThen(writeAndRename),
			withRetry(config),
		);
	};

const makeExists =
	(_config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<boolean, StorageError> =>
		Effect.tryPromise({
			try: () => fs.access(path),
			catch: (error) => toStorageError(path, "read", error),
		}).pipe(
			Effect.as(true),
			Effect.catchAll((error) =>
				errorCode(error.cause) === "ENOENT" ||
				errorCode(error.cause) === "ENOTDIR"
					? Effect.succeed(false)
					: Effect.fail(error),
			),
		);

const makeList =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<ReadonlyArray<DirectoryEntry>, StorageError> =>
		Effect.tryPromise({
			try: () => fs.readdir(path, { withFileTypes: true }),
			catch: (error) => toStorageError(path, "list", error),
		}).pipe(
			Effect.map((entries) =>
				entries
					.filter((entry) => entry.isDirectory() || entry.isFile())
					.map(
						(entry): DirectoryEntry => ({
							name: entry.name,
							kind: entry.isDirectory() ? "directory" : "file",
						}),
					),
			),
			withRetry(config),
		);

const makeRemove =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<void, StorageError> =>
		Effect.tryPromise({
			try: () => fs.unlink(path),
			catch: (error) => toStorageError(path, "delete", error),
		}).pipe(withRetry(config));

// ============================================================================
// Layer construction
// ============================================================================

const makeAdapter = (
	config: Required<NodeAdapterConfig>,
): StorageAdapterShape => ({
	read: makeRead(config),
	write: makeWrite(config),
	exists: makeExists(config),
	list: makeList(config),
	makeDirectory: makeDirectory(config),
	remove: makeRemove(config),
});

/**
 * Creates a NodeStorageLayer with custom configuration.
 */
export const makeNodeStorageLayer = (
	config: NodeAdapterConfig = {},
): Layer.Layer<StorageAdapter> => {
	const resolved = { ...defaultConfig, ...config };
	return Layer.succeed(StorageAdapter, makeAdapter(resolved));
};

/**
 * Default NodeStorageLayer with standard configuration.
 */
export const NodeStorageLayer: Layer.Layer<StorageAdapter> =
	makeNodeStorageLayer();
