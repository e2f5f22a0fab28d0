/**
 * Migration execution engine. Runs one migration at a time through
 * pending -> running -> completed | skipped | failed, and batches runs in
 * catalog order.
 */

import { Cause, Clock, Effect, Either, Option } from "effect";
import {
	MigrationExecutionError,
	PreconditionError,
} from "../errors/migration-errors.js";
import type { StateCheckError } from "../errors/storage-errors.js";
import type { CollaboratorError } from "../errors/collaborator-errors.js";
import { type Collaborators, EntityDatabase } from "../services/collaborators.js";
import { StorageState } from "../services/storage-state.js";
import type { StorageAdapter } from "../storage/storage-service.js";
import type {
	BatchSummary,
	ExecutionResult,
	MigrationDescriptor,
	RunMigrationOptions,
	RunMigrationsOptions,
} from "../types/migration-types.js";
import { makeMigrationContext } from "./context.js";
import { advance, pendingResult } from "./execution-state.js";
import { MigrationLedger } from "./ledger.js";
import { loadMigration, type MigrationModuleSource } from "./loader.js";

/**
 * Everything a run needs from its environment.
 */
export type MigrationEngineServices =
	| StorageState
	| MigrationLedger
	| MigrationModuleSource
	| StorageAdapter
	| Collaborators;

/**
 * Upper bound passed to the list calls used for counting.
 */
export const COUNT_LIMIT = 1_000_000;

interface Counts {
	readonly entities: number;
	readonly relationships: number;
	readonly versions: number;
}

const countOrZero = (
	label: string,
	effect: Effect.Effect<number, CollaboratorError | StateCheckError>,
): Effect.Effect<number> =>
	effect.pipe(
		Effect.catchAll((error) =>
			Effect.logWarning(`Failed to count ${label}: ${error.message}`).pipe(
				Effect.as(0),
			),
		),
	);

const snapshotCounts: Effect.Effect<Counts, never, EntityDatabase | StorageState> =
	Effect.gen(function* () {
		const db = yield* EntityDatabase;
		const state = yield* StorageState;
		const entities = yield* countOrZero(
			"entities",
			db
				.listEntities({ limit: COUNT_LIMIT })
				.pipe(Effect.map((rows) => rows.length)),
		);
		const relationships = yield* countOrZero(
			"relationships",
			db
				.listRelationships({ limit: COUNT_LIMIT })
				.pipe(Effect.map((rows) => rows.length)),
		);
		const versions = yield* countOrZero(
			"version records",
			state.countVersionRecords(),
		);
		return { entities, relationships, versions };
	});

const traceOf = (error: unknown): string =>
	error instanceof Error
		? (error.stack ?? `${error.name}: ${error.message}`)
		: String(error);

const messageOf = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

// ============================================================================
// Single Run
// ============================================================================

/**
 * Run one migration.
 *
 * Never fails: every problem ends up in the returned result as a `failed`
 * status with a tagged error. `dryRun` defaults to `true`.
 */
export const runMigration = (
	descriptor: MigrationDescriptor,
	options: RunMigrationOptions = {},
): Effect.Effect<ExecutionResult, never, MigrationEngineServices> => {
	const dryRun = options.dryRun ?? true;
	const autoCommit = options.autoCommit ?? true;
	const force = options.force ?? false;
	const name = descriptor.fullName;

	return Effect.gen(function* () {
		const state = yield* StorageState;
		const ledger = yield* MigrationLedger;
		let result = pendingResult(descriptor);

		yield* Effect.logInfo(`Running migration ${name}`);

		// Clean-state gate, independent of force.
		const clean = yield* state.isClean().pipe(Effect.either);
		if (Either.isLeft(clean) || !clean.right) {
			const error = Either.isLeft(clean)
				? new PreconditionError({
						migration: name,
						phase: "precondition",
						reason: "state-check-failed",
						message: `Cannot confirm storage has no uncommitted changes before running ${name}: ${clean.left.message}`,
						cause: clean.left,
					})
				: new PreconditionError({
						migration: name,
						phase: "precondition",
						reason: "uncommitted-changes",
						message: `Storage has uncommitted changes; commit or revert them before running ${name}`,
					});
			yield* Effect.logError(error.message);
			return yield* advance(result, "failed", {
				error,
				logs: [`ERROR: ${error.message}`],
			});
		}

		const applied = yield* ledger.isApplied(descriptor);
		if (applied && !force) {
			yield* Effect.logInfo(
				`Migration ${name} already applied (migration log exists), skipping`,
			);
			return yield* advance(result, "skipped", {
				logs: [`Migration ${name} already applied, skipping`],
			});
		}
		if (applied) {
			yield* Effect.logWarning(
				`Force flag set: re-executing already-applied migration ${name}`,
			);
			result = {
				...result,
				logs: [...result.logs, "WARNING: Force re-execution of already-applied migration"],
			};
		}

		const loaded = yield* loadMigration(descriptor).pipe(Effect.either);
		if (Either.isLeft(loaded)) {
			const error = loaded.left;
			yield* Effect.logError(`Failed to load migration script: ${error.message}`);
			return yield* advance(result, "failed", {
				error,
				logs: [...result.logs, `Failed to load migration script: ${error.message}`],
			});
		}
		const migration = loaded.right;

		const context = yield* makeMigrationContext(descriptor);
		const before = yield* snapshotCounts;

		result = yield* advance(result, "running");
		yield* Effect.logInfo(`Executing migration ${name}...`);
		const startedAt = yield* Clock.currentTimeMillis;
		const outcome = yield* Effect.tryPromise({
			try: () => migration.entryPoint(context),
			catch: (error) => error,
		}).pipe(Effect.either);
		const finishedAt = yield* Clock.currentTimeMillis;
		const durationSeconds = (finishedAt - startedAt) / 1000;

		if (Either.isLeft(outcome)) {
			const thrown = outcome.left;
			const trace = traceOf(thrown);
			const error = new MigrationExecutionError({
				migration: name,
				phase: "execution",
				message: `Migration ${name} failed: ${messageOf(thrown)}`,
				trace,
				cause: thrown,
			});
			yield* Effect.logError(
				`Migration ${name} failed after ${durationSeconds.toFixed(1)}s: ${messageOf(thrown)}\n${trace}`,
			);
			return yield* advance(result, "failed", {
				error,
				durationSeconds,
				logs: [
					...result.logs,
					...context.logs,
					`ERROR: ${messageOf(thrown)}`,
					`Traceback:\n${trace}`,
				],
			});
		}

		const after = yield* snapshotCounts;
		const entitiesCreated = after.entities - before.entities;
		const relationshipsCreated = after.relationships - before.relationships;
		const versionsCreated = after.versions - before.versions;
		if (entitiesCreated < 0 || relationshipsCreated < 0) {
			yield* Effect.logWarning(
				`Migration ${name} removed more records than it created (entities: ${entitiesCreated}, relationships: ${relationshipsCreated})`,
			);
		}

		result = yield* advance(result, "completed", {
			durationSeconds,
			entitiesCreated,
			relationshipsCreated,
			versionsCreated,
			logs: [...result.logs, ...context.logs],
		});
		yield* Effect.logInfo(
			`Migration ${name} completed successfully in ${durationSeconds.toFixed(1)}s (created: ${entitiesCreated} entities, ${relationshipsCreated} relationships)`,
		);

		if (!autoCommit || dryRun) {
			return result;
		}

		const diff = yield* state.captureDiff().pipe(
			Effect.catchAll((error) =>
				Effect.logWarning(`Failed to capture storage diff: ${error.message}`).pipe(
					Effect.as(Option.none<string>()),
				),
			),
		);
		result = { ...result, diffCaptured: Option.isSome(diff) };

		const executedAt = new Date(yield* Clock.currentTimeMillis);
		const recorded = yield* ledger
			.record(descriptor, result, {
				metadata: migration.metadata,
				executedAt,
				diff,
			})
			.pipe(Effect.either);
		yield* ledger.invalidateCache();

		if (Either.isLeft(recorded)) {
			const error = recorded.left;
			yield* Effect.logError(`Failed to store migration log: ${error.message}`);
			return yield* advance(result, "failed", {
				error,
				logs: [...result.logs, `ERROR: Failed to store migration log: ${error.message}`],
			});
		}
		yield* Effect.logInfo(`Migration log stored for ${name}`);

		const checkpoint = yield* state
			.checkpoint(`Apply migration ${name}`)
			.pipe(Effect.either);
		if (Either.isLeft(checkpoint)) {
			yield* Effect.logWarning(
				`Failed to checkpoint storage after ${name}: ${checkpoint.left.message}`,
			);
			return {
				...result,
				logs: [
					...result.logs,
					`WARNING: Failed to checkpoint storage: ${checkpoint.left.message}`,
				],
			};
		}
		return result;
	}).pipe(Effect.annotateLogs("migration", name));
};

// ============================================================================
// Batches
// ============================================================================

const failedFromDefect = (
	descriptor: MigrationDescriptor,
	cause: Cause.Cause<unknown>,
): Effect.Effect<ExecutionResult> => {
	const trace = Cause.pretty(cause);
	return advance(pendingResult(descriptor), "failed", {
		error: new MigrationExecutionError({
			migration: descriptor.fullName,
			phase: "execution",
			message: `Migration ${descriptor.fullName} failed unexpectedly: ${messageOf(Cause.squash(cause))}`,
			trace,
		}),
		logs: [`ERROR: ${trace}`],
	});
};

/**
 * Run `descriptors` in order, never forcing. With `stopOnFailure` (the
 * default) the batch ends at the first failed result, which is included.
 */
export const runMigrations = (
	descriptors: ReadonlyArray<MigrationDescriptor>,
	options: RunMigrationsOptions = {},
): Effect.Effect<ReadonlyArray<ExecutionResult>, never, MigrationEngineServices> =>
	Effect.gen(function* () {
		const dryRun = options.dryRun ?? false;
		const autoCommit = options.autoCommit ?? true;
		const stopOnFailure = options.stopOnFailure ?? true;

		yield* Effect.logInfo(`Running ${descriptors.length} migrations`);
		const results: ExecutionResult[] = [];
		for (const descriptor of descriptors) {
			const result = yield* runMigration(descriptor, {
				dryRun,
				autoCommit,
				force: false,
			}).pipe(
				Effect.catchAllCause((cause) => failedFromDefect(descriptor, cause)),
			);
			results.push(result);
			if (result.status === "failed" && stopOnFailure) {
				yield* Effect.logWarning(
					`Stopping batch after failed migration ${descriptor.fullName}`,
				);
				break;
			}
		}

		const summary = summarizeResults(results);
		yield* Effect.logInfo(
			`Batch finished: ${summary.completed} completed, ${summary.skipped} skipped, ${summary.failed} failed`,
		);
		return results;
	});

/**
 * Run whatever the ledger does not list yet.
 */
export const runPendingMigrations = (
	catalog: ReadonlyArray<MigrationDescriptor>,
	options: RunMigrationsOptions = {},
): Effect.Effect<ReadonlyArray<ExecutionResult>, never, MigrationEngineServices> =>
	Effect.gen(function* () {
		const ledger = yield* MigrationLedger;
		const pending = yield* ledger.getPending(catalog);
		if (pending.length === 0) {
			yield* Effect.logInfo("No pending migrations");
			return [];
		}
		return yield* runMigrations(pending, options);
	});

export const summarizeResults = (
	results: ReadonlyArray<ExecutionResult>,
): BatchSummary => ({
	total: results.length,
	completed: results.filter((result) => result.status === "completed").length,
	skipped: results.filter((result) => result.status === "skipped").length,
	failed: results.filter((result) => result.status === "failed").length,
});
