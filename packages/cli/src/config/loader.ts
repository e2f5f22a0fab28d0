import { Config, Data, Effect, Option, Schema } from "effect"
import * as path from "node:path"
import * as fs from "node:fs"
import { pathToFileURL } from "node:url"
import { DEFAULT_ENTRY_SCRIPTS, DEFAULT_LEDGER_DIR } from "@civic-ledger/node"

// ============================================================================
// Config Loading Errors
// ============================================================================

/**
 * The config file could not be read or evaluated.
 */
export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
	readonly configPath: string
	readonly reason: string
	readonly message: string
}> {}

/**
 * The config file was read but does not describe a valid configuration.
 */
export class ConfigValidationError extends Data.TaggedError(
	"ConfigValidationError",
)<{
	readonly configPath: string
	readonly reason: string
	readonly message: string
}> {}

// ============================================================================
// Config Shape
// ============================================================================

/**
 * What a config file declares. Relative paths are relative to the file.
 */
export const ConfigFileSchema = Schema.Struct({
	migrationsDir: Schema.String,
	storageRoot: Schema.String,
	stateTracking: Schema.optional(Schema.Literal("git", "none")),
	entryScripts: Schema.optional(Schema.Array(Schema.String)),
	ledgerDir: Schema.optional(Schema.String),
})

export type ConfigFile = typeof ConfigFileSchema.Type

/**
 * Fully resolved configuration: absolute paths, defaults applied.
 */
export interface CliConfig {
	readonly configPath: string
	readonly migrationsDir: string
	readonly storageRoot: string
	readonly stateTracking: "git" | "none"
	readonly entryScripts: ReadonlyArray<string>
	readonly ledgerDir: string
}

/** Replaces `storageRoot` from the config file when set. */
export const STORAGE_ROOT_ENV = "CIVIC_LEDGER_STORAGE_ROOT"

const SUPPORTED_EXTENSIONS: ReadonlyArray<string> = [".ts", ".js", ".json"]

// ============================================================================
// Raw Loading
// ============================================================================

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : String(error)

function loadJsonConfig(
	configPath: string,
): Effect.Effect<unknown, ConfigLoadError> {
	return Effect.try({
		try: (): unknown => JSON.parse(fs.readFileSync(configPath, "utf-8")),
		catch: (error) =>
			new ConfigLoadError({
				configPath,
				reason: `Failed to parse JSON config: ${describe(error)}`,
				message: `Failed to load config from ${configPath}: ${describe(error)}`,
			}),
	})
}

/**
 * Import a TypeScript or JavaScript config; the default export is the config.
 */
function loadModuleConfig(
	configPath: string,
): Effect.Effect<unknown, ConfigLoadError> {
	return Effect.tryPromise({
		try: async (): Promise<unknown> => {
			const module: unknown = await import(pathToFileURL(configPath).href)
			return typeof module === "object" && module !== null && "default" in module
				? module.default
				: module
		},
		catch: (error) =>
			new ConfigLoadError({
				configPath,
				reason: `Failed to import config module: ${describe(error)}`,
				message: `Failed to load config from ${configPath}: ${describe(error)}`,
			}),
	})
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Load, validate and resolve a civic-ledger config file.
 *
 * Supports `.ts`, `.js` (default export) and `.json`. The
 * `CIVIC_LEDGER_STORAGE_ROOT` environment variable overrides `storageRoot`
 * and is resolved against `cwd`.
 */
export function loadConfig(
	configPath: string,
	cwd: string = process.cwd(),
): Effect.Effect<CliConfig, ConfigLoadError | ConfigValidationError> {
	return Effect.gen(function* () {
		const absolutePath = path.resolve(cwd, configPath)
		const ext = path.extname(absolutePath).toLowerCase()
		if (!SUPPORTED_EXTENSIONS.includes(ext)) {
			return yield* Effect.fail(
				new ConfigLoadError({
					configPath: absolutePath,
					reason: `Unsupported config file extension: ${ext}`,
					message: `Cannot load config from ${absolutePath}: Unsupported extension '${ext}'. Use .ts, .js, or .json`,
				}),
			)
		}

		const raw =
			ext === ".json"
				? yield* loadJsonConfig(absolutePath)
				: yield* loadModuleConfig(absolutePath)

		const file = yield* Schema.decodeUnknown(ConfigFileSchema)(raw).pipe(
			Effect.mapError(
				(error) =>
					new ConfigValidationError({
						configPath: absolutePath,
						reason: error.message,
						message: `Invalid config in ${absolutePath}: ${error.message}`,
					}),
			),
		)

		const storageOverride = yield* Config.option(
			Config.string(STORAGE_ROOT_ENV),
		).pipe(
			Effect.mapError(
				(error) =>
					new ConfigLoadError({
						configPath: absolutePath,
						reason: `Invalid ${STORAGE_ROOT_ENV}`,
						message: `Failed to read ${STORAGE_ROOT_ENV}: ${String(error)}`,
					}),
			),
		)

		const configDir = path.dirname(absolutePath)
		const storageRoot = Option.match(storageOverride, {
			onNone: () => path.resolve(configDir, file.storageRoot),
			onSome: (override) => path.resolve(cwd, override),
		})

		return {
			configPath: absolutePath,
			migrationsDir: path.resolve(configDir, file.migrationsDir),
			storageRoot,
			stateTracking: file.stateTracking ?? "git",
			entryScripts: file.entryScripts ?? DEFAULT_ENTRY_SCRIPTS,
			ledgerDir: file.ledgerDir ?? DEFAULT_LEDGER_DIR,
		}
	})
}
