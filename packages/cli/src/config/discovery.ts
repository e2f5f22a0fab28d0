import { Data, Effect } from "effect"
import * as path from "node:path"
import * as fs from "node:fs"

// ============================================================================
// Config Discovery Error
// ============================================================================

/**
 * No config file could be found.
 */
export class ConfigNotFoundError extends Data.TaggedError("ConfigNotFoundError")<{
	readonly searchedPaths: readonly string[]
	readonly message: string
}> {}

// ============================================================================
// Config File Names (in priority order)
// ============================================================================

export const CONFIG_FILE_NAMES = [
	"civic-ledger.config.ts",
	"civic-ledger.config.js",
	"civic-ledger.config.json",
] as const

// ============================================================================
// Discovery Functions
// ============================================================================

function statOf(target: string): fs.Stats | undefined {
	return fs.statSync(target, { throwIfNoEntry: false })
}

function fileExists(filePath: string): boolean {
	return statOf(filePath)?.isFile() === true
}

function directoryExists(dirPath: string): boolean {
	return statOf(dirPath)?.isDirectory() === true
}

/**
 * Walk from the start directory upward to the filesystem root.
 */
function* walkUpward(startDir: string): Generator<string> {
	let currentDir = startDir
	while (true) {
		yield currentDir
		const parent = path.dirname(currentDir)
		if (parent === currentDir) return
		currentDir = parent
	}
}

/**
 * Discover the civic-ledger config file.
 *
 * An explicit `overridePath` is resolved against `cwd` and must exist.
 * Otherwise the search walks from `cwd` to the filesystem root and, in each
 * directory, takes the first of {@link CONFIG_FILE_NAMES} present.
 */
export function discoverConfig(
	cwd: string,
	overridePath?: string,
): Effect.Effect<string, ConfigNotFoundError> {
	return Effect.gen(function* () {
		if (overridePath !== undefined) {
			const absoluteOverridePath = path.resolve(cwd, overridePath)
			if (fileExists(absoluteOverridePath)) {
				return absoluteOverridePath
			}
			return yield* Effect.fail(
				new ConfigNotFoundError({
					searchedPaths: [absoluteOverridePath],
					message: `Config file not found: ${absoluteOverridePath}`,
				}),
			)
		}

		const startDir = path.resolve(cwd)
		if (!directoryExists(startDir)) {
			return yield* Effect.fail(
				new ConfigNotFoundError({
					searchedPaths: [],
					message: `Starting directory does not exist: ${startDir}`,
				}),
			)
		}

		const searchedPaths: string[] = []
		for (const dir of walkUpward(startDir)) {
			for (const configName of CONFIG_FILE_NAMES) {
				const candidate = path.join(dir, configName)
				if (fileExists(candidate)) {
					yield* Effect.logDebug(`Using config file ${candidate}`)
					return candidate
				}
				searchedPaths.push(candidate)
			}
		}

		return yield* Effect.fail(
			new ConfigNotFoundError({
				searchedPaths,
				message: `No civic-ledger config file found. Searched from ${startDir} to filesystem root.\nLooking for: ${CONFIG_FILE_NAMES.join(", ")}`,
			}),
		)
	})
}
