/**
 * civic-ledger CLI - Migrate Command
 *
 * Subcommands:
 * - `migrate list`: every discovered migration with its applied/pending state
 * - `migrate pending`: only the migrations the ledger does not list
 * - `migrate show <name>`: catalog metadata plus the ledger entry, if any
 * - `migrate run [names...]`: run the named migrations, or all pending ones
 */

import { Cause, Effect, type Layer, Option } from "effect"
import {
	discoverMigrations,
	findMigration,
	makeNodeMigrationLayer,
	MigrationLedger,
	runMigration,
	runMigrations,
	summarizeResults,
	type ExecutionResult,
	type LedgerEntry,
	type MigrationCatalog,
	type MigrationDescriptor,
	type MigrationEngineServices,
} from "@civic-ledger/node"
import type { CliConfig } from "../config/loader.js"
import { format, type OutputFormat, type OutputRecord } from "../output/formatter.js"
import { confirm as promptConfirm, type Confirm } from "../prompt.js"

export type MigrateSubcommand = "list" | "pending" | "show" | "run"

const SUBCOMMANDS: ReadonlyArray<MigrateSubcommand> = ["list", "pending", "show", "run"]

export interface MigrateOptions {
	readonly config: CliConfig
	readonly subcommand: MigrateSubcommand
	/** Migration names following the subcommand */
	readonly names: readonly string[]
	readonly format?: OutputFormat
	readonly dryRun?: boolean
	readonly force?: boolean
	readonly continueOnFailure?: boolean
	/** Skip the ledger entry (and checkpoint) after a successful run */
	readonly noCommit?: boolean
	/** Skip the confirmation prompt */
	readonly yes?: boolean
}

/**
 * Replaceable collaborators of the command. Defaults wire the Node.js
 * layers from the config and prompt on the terminal.
 */
export interface MigrateDependencies {
	readonly layer?: Layer.Layer<MigrationEngineServices>
	readonly confirm?: Confirm
}

export interface MigrateResult {
	readonly exitCode: 0 | 1
	/** Formatted output for stdout */
	readonly output: string
	/** Discovery warnings, for stderr */
	readonly warnings: readonly string[]
	/** Error description, for stderr */
	readonly message?: string
	readonly aborted?: boolean
}

/**
 * Split the positionals after `migrate` into subcommand and names.
 * Without a recognised subcommand, `list` is assumed.
 */
export function detectSubcommand(
	positionalArgs: readonly string[],
): { readonly subcommand: MigrateSubcommand | undefined; readonly names: readonly string[] } {
	const [first, ...rest] = positionalArgs
	if (first === undefined) {
		return { subcommand: "list", names: [] }
	}
	const subcommand = SUBCOMMANDS.find((candidate) => candidate === first)
	return { subcommand, names: subcommand === undefined ? positionalArgs : rest }
}

// ============================================================================
// Rows
// ============================================================================

function catalogRow(descriptor: MigrationDescriptor, applied: boolean): OutputRecord {
	return {
		name: descriptor.fullName,
		status: applied ? "applied" : "pending",
		author: descriptor.author ?? null,
		date: descriptor.authoredDate ?? null,
		description: descriptor.description ?? null,
	}
}

function resultRow(result: ExecutionResult): OutputRecord {
	return {
		name: result.migration.fullName,
		status: result.status,
		duration: `${result.durationSeconds.toFixed(1)}s`,
		entities: result.entitiesCreated,
		relationships: result.relationshipsCreated,
		versions: result.versionsCreated,
		error: result.error?.message ?? null,
	}
}

function ledgerRow(descriptor: MigrationDescriptor, entry: LedgerEntry): OutputRecord {
	const { metadata } = entry
	return {
		name: descriptor.fullName,
		status: "applied",
		author: metadata.author,
		date: metadata.date,
		description: metadata.description,
		executed_at: metadata.executed_at,
		duration: `${metadata.duration_seconds.toFixed(1)}s`,
		entities_created: metadata.changes.entities_created,
		relationships_created: metadata.changes.relationships_created,
		versions_created: metadata.changes.versions_created,
		has_diff: entry.hasDiff,
		summary: entry.changes?.summary ?? null,
	}
}

function warningsOf(catalog: MigrationCatalog): readonly string[] {
	return catalog.warnings.map((warning) => warning.message)
}

const done = (
	fields: Omit<MigrateResult, "warnings"> & { readonly warnings?: readonly string[] },
): MigrateResult => ({ warnings: [], ...fields })

// ============================================================================
// Subcommands
// ============================================================================

type CommandEffect = Effect.Effect<MigrateResult, never, MigrationEngineServices>

function listMigrations(options: MigrateOptions, pendingOnly: boolean): CommandEffect {
	return Effect.gen(function* () {
		const catalog = yield* discoverMigrations(options.config.migrationsDir, {
			entryScripts: options.config.entryScripts,
		})
		const ledger = yield* MigrationLedger
		const applied = yield* ledger.getApplied()
		const rows = catalog.migrations
			.map((descriptor) => catalogRow(descriptor, applied.has(descriptor.fullName)))
			.filter((row) => !pendingOnly || row.status === "pending")
		return done({
			exitCode: 0,
			output: format(options.format ?? "table", rows),
			warnings: warningsOf(catalog),
		})
	})
}

function showMigration(options: MigrateOptions): CommandEffect {
	return Effect.gen(function* () {
		const [name] = options.names
		if (name === undefined) {
			return done({ exitCode: 1, output: "", message: "migrate show requires a migration name" })
		}
		const catalog = yield* discoverMigrations(options.config.migrationsDir, {
			entryScripts: options.config.entryScripts,
		})
		const descriptor = findMigration(catalog, name)
		if (Option.isNone(descriptor)) {
			return done({ exitCode: 1, output: "", message: `Unknown migration: ${name}` })
		}

		const ledger = yield* MigrationLedger
		const entry = yield* ledger.readEntry(name).pipe(Effect.either)
		if (entry._tag === "Left") {
			return done({ exitCode: 1, output: "", message: entry.left.message })
		}
		const row = Option.match(entry.right, {
			onNone: () => catalogRow(descriptor.value, false),
			onSome: (found) => ledgerRow(descriptor.value, found),
		})
		const readme = descriptor.value.readme ?? null
		return done({ exitCode: 0, output: format(options.format ?? "table", [{ ...row, readme }]) })
	})
}

export const UNCOMMITTED_BATCH_WARNING =
	"Under git tracking a dry run or --no-commit leaves uncommitted changes, so every migration after the first will fail the clean-state check; run them one at a time"

function runSelected(options: MigrateOptions, confirmRun: Confirm): CommandEffect {
	return Effect.gen(function* () {
		const outputFormat = options.format ?? "table"
		const dryRun = options.dryRun ?? false
		const autoCommit = !(options.noCommit ?? false)
		const stopOnFailure = !(options.continueOnFailure ?? false)

		const catalog = yield* discoverMigrations(options.config.migrationsDir, {
			entryScripts: options.config.entryScripts,
		})
		const catalogWarnings = warningsOf(catalog)

		let selected: ReadonlyArray<MigrationDescriptor>
		if (options.names.length > 0) {
			const unknown = options.names.filter((name) => Option.isNone(findMigration(catalog, name)))
			if (unknown.length > 0) {
				return done({
					exitCode: 1,
					output: "",
					warnings: catalogWarnings,
					message: `Unknown migration: ${unknown.join(", ")}`,
				})
			}
			selected = catalog.migrations.filter((descriptor) =>
				options.names.includes(descriptor.fullName),
			)
		} else {
			const ledger = yield* MigrationLedger
			selected = yield* ledger.getPending(catalog.migrations)
		}

		const leavesChanges = dryRun || !autoCommit
		const warnings =
			leavesChanges && options.config.stateTracking === "git" && selected.length > 1
				? [...catalogWarnings, UNCOMMITTED_BATCH_WARNING]
				: catalogWarnings

		if (selected.length === 0) {
			return done({ exitCode: 0, output: "No pending migrations.", warnings })
		}

		if (!dryRun) {
			const answer = yield* Effect.promise(() =>
				confirmRun({
					message: `Run ${selected.length} migration(s) against ${options.config.storageRoot}?`,
					assumeYes: options.yes,
				}),
			)
			if (!answer.confirmed) {
				return done({ exitCode: 0, output: "Aborted.", warnings, aborted: true })
			}
		}

		let results: ReadonlyArray<ExecutionResult>
		if (options.force ?? false) {
			const forced: ExecutionResult[] = []
			for (const descriptor of selected) {
				const result = yield* runMigration(descriptor, { dryRun, autoCommit, force: true })
				forced.push(result)
				if (result.status === "failed" && stopOnFailure) break
			}
			results = forced
		} else {
			results = yield* runMigrations(selected, { dryRun, autoCommit, stopOnFailure })
		}

		const summary = summarizeResults(results)
		const table = format(outputFormat, results.map(resultRow))
		const output =
			outputFormat === "table"
				? `${table}\n\n${summary.total} run: ${summary.completed} completed, ${summary.skipped} skipped, ${summary.failed} failed${dryRun ? " (dry run)" : ""}`
				: table
		return done({ exitCode: summary.failed > 0 ? 1 : 0, output, warnings })
	})
}

// ============================================================================
// Entry Points
// ============================================================================

export function runMigrateCommand(
	options: MigrateOptions,
	dependencies: MigrateDependencies = {},
): Effect.Effect<MigrateResult, never> {
	const layer =
		dependencies.layer ??
		makeNodeMigrationLayer({
			storageRoot: options.config.storageRoot,
			stateTracking: options.config.stateTracking,
			ledgerDir: options.config.ledgerDir,
		})

	const program: CommandEffect = (() => {
		switch (options.subcommand) {
			case "list":
				return listMigrations(options, false)
			case "pending":
				return listMigrations(options, true)
			case "show":
				return showMigration(options)
			case "run":
				return runSelected(options, dependencies.confirm ?? promptConfirm)
		}
	})()

	return program.pipe(
		Effect.provide(layer),
		Effect.catchAllCause((cause) =>
			Effect.succeed(
				done({ exitCode: 1, output: "", message: `Migrate command failed: ${Cause.pretty(cause)}` }),
			),
		),
	)
}

export async function handleMigrate(
	options: MigrateOptions,
	dependencies?: MigrateDependencies,
): Promise<MigrateResult> {
	return Effect.runPromise(runMigrateCommand(options, dependencies))
}
