/**
 * In-memory implementation of StorageAdapter as an Effect Layer.
 * Intended for testing: files live in a Map<string, string>, directories in a Set.
 */

import { posix } from "node:path"
import { Effect, Layer } from "effect"
import {
	type DirectoryEntry,
	StorageAdapter,
	type StorageAdapterShape,
} from "./storage-service.js"
import { StorageError } from "../errors/storage-errors.js"

// ============================================================================
// In-memory storage adapter
// ============================================================================

const normalize = (path: string): string => {
	const normalized = posix.normalize(path)
	return normalized.length > 1 && normalized.endsWith("/")
		? normalized.slice(0, -1)
		: normalized
}

const ancestorsOf = (path: string): ReadonlyArray<string> => {
	const result: string[] = []
	let current = posix.dirname(path)
	while (current !== path && !result.includes(current)) {
		result.push(current)
		if (current === "/" || current === ".") break
		const parent = posix.dirname(current)
		if (parent === current) break
		current = parent
	}
	return result
}

const makeInMemoryAdapter = (
	files: Map<string, string>,
	directories: Set<string>,
): StorageAdapterShape => {
	const isDirectory = (path: string): boolean => {
		if (directories.has(path)) return true
		const prefix = path === "/" ? "/" : `${path}/`
		for (const file of files.keys()) {
			if (file.startsWith(prefix)) return true
		}
		return false
	}

	return {
		read: (path: string) =>
			Effect.suspend(() => {
				const content = files.get(normalize(path))
				if (content === undefined) {
					return Effect.fail(
						new StorageError({
							path,
							operation: "read",
							message: `File not found: ${path}`,
						}),
					)
				}
				return Effect.succeed(content)
			}),

		write: (path: string, data: string) =>
			Effect.suspend(() => {
				const target = normalize(path)
				if (isDirectory(target)) {
					return Effect.fail(
						new StorageError({
							path,
							operation: "write",
							message: `Is a directory: ${path}`,
						}),
					)
				}
				for (const ancestor of ancestorsOf(target)) {
					if (files.has(ancestor)) {
						return Effect.fail(
							new StorageError({
								path,
								operation: "write",
								message: `Not a directory: ${ancestor}`,
							}),
						)
					}
				}
				for (const ancestor of ancestorsOf(target)) {
					directories.add(ancestor)
				}
				files.set(target, data)
				return Effect.void
			}),

		exists: (path: string) =>
			Effect.sync(() => {
				const target = normalize(path)
				return files.has(target) || isDirectory(target)
			}),

		list: (path: string) =>
			Effect.suspend(() => {
				const target = normalize(path)
				if (!isDirectory(target)) {
					return Effect.fail(
						new StorageError({
							path,
							operation: "list",
							message: `Directory not found: ${path}`,
						}),
					)
				}
				const prefix = target === "/" ? "/" : `${target}/`
				const seen = new Map<string, DirectoryEntry["kind"]>()
				for (const dir of directories) {
					if (dir.startsWith(prefix) && dir !== target) {
						const name = dir.slice(prefix.length).split("/")[0]
						seen.set(name, "directory")
					}
				}
				for (const file of files.keys()) {
					if (file.startsWith(prefix)) {
						const rest = file.slice(prefix.length)
						const [name] = rest.split("/")
						if (!seen.has(name)) {
							seen.set(name, rest.includes("/") ? "directory" : "file")
						}
					}
				}
				return Effect.succeed(
					Array.from(seen, ([name, kind]): DirectoryEntry => ({ name, kind })),
				)
			}),

		makeDirectory: (path: string) =>
			Effect.suspend(() => {
				const target = normalize(path)
				for (const candidate of [target, ...ancestorsOf(target)]) {
					if (files.has(candidate)) {
						return Effect.fail(
							new StorageError({
								path,
								operation: "mkdir",
								message: `Not a directory: ${candidate}`,
							}),
						)
					}
				}
				directories.add(target)
				for (const ancestor of ancestorsOf(target)) {
					directories.add(ancestor)
				}
				return Effect.void
			}),

		remove: (path: string) =>
			Effect.suspend(() => {
				const target = normalize(path)
				if (!files.has(target)) {
					return Effect.fail(
						new StorageError({
							path,
							operation: "delete",
							message: `File not found: ${path}`,
						}),
					)
				}
				files.delete(target)
				return Effect.void
			}),
	}
}

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an InMemoryStorageLayer backed by the provided Map.
 * Pass your own Map to seed or inspect stored files in tests.
 */
export const makeInMemoryStorageLayer = (
	files: Map<string, string> = new Map(),
	directories: Set<string> = new Set(),
): Layer.Layer<StorageAdapter> =>
	Layer.succeed(StorageAdapter, makeInMemoryAdapter(files, directories))

/**
 * Default InMemoryStorageLayer with a fresh empty Map.
 */
export const InMemoryStorageLayer: Layer.Layer<StorageAdapter> =
	makeInMemoryStorageLayer()
