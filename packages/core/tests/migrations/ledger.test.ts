import { Effect, Either, Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	makeMigrationLedger,
	type MigrationLedgerShape,
} from "../../src/migrations/ledger.js";
import { makeInMemoryStorageLayer } from "../../src/storage/in-memory-adapter-layer.js";
import type { ExecutionResult } from "../../src/types/migration-types.js";
import {
	descriptorFor,
	LEDGER_ROOT,
	STORAGE_ROOT,
	testMetadata,
} from "./helpers.js";

const withLedger = <A, E>(
	files: Map<string, string>,
	program: (ledger: MigrationLedgerShape) => Effect.Effect<A, E>,
) =>
	Effect.runPromise(
		makeMigrationLedger({ storageRoot: STORAGE_ROOT }).pipe(
			Effect.flatMap(program),
			Effect.provide(makeInMemoryStorageLayer(files)),
		),
	);

const markApplied = (files: Map<string, string>, fullName: string) => {
	files.set(`${LEDGER_ROOT}/${fullName}/metadata.json`, "{}");
};

const completedResult = (fullName: string): ExecutionResult => ({
	migration: descriptorFor(fullName),
	status: "completed",
	durationSeconds: 2.5,
	entitiesCreated: 3,
	relationshipsCreated: 1,
	versionsCreated: 4,
	diffCaptured: true,
	logs: ["line one", "line two"],
});

const executedAt = new Date("2024-01-15T10:00:00.000Z");

describe("MigrationLedger applied set", () => {
	it("is empty when the ledger directory does not exist", async () => {
		const applied = await withLedger(new Map(), (ledger) => ledger.getApplied());
		expect([...applied]).toEqual([]);
	});

	it("lists entry directories that contain a metadata record", async () => {
		const files = new Map<string, string>();
		markApplied(files, "000-a");
		markApplied(files, "002-c");
		files.set(`${LEDGER_ROOT}/001-b/changes.json`, "{}");
		files.set(`${LEDGER_ROOT}/notes.txt`, "stray file");

		const applied = await withLedger(files, (ledger) => ledger.getApplied());
		expect([...applied].sort()).toEqual(["000-a", "002-c"]);
	});

	it("computes pending migrations in catalog order", async () => {
		const files = new Map<string, string>();
		markApplied(files, "000-a");
		const catalog = ["000-a", "001-b", "002-c"].map(descriptorFor);

		const pending = await withLedger(files, (ledger) => ledger.getPending(catalog));
		expect(pending.map((m) => m.fullName)).toEqual(["001-b", "002-c"]);
	});

	it("answers membership through isApplied", async () => {
		const files = new Map<string, string>();
		markApplied(files, "000-a");

		const answers = await withLedger(files, (ledger) =>
			Effect.all([
				ledger.isApplied(descriptorFor("000-a")),
				ledger.isApplied(descriptorFor("001-b")),
			]),
		);
		expect(answers).toEqual([true, false]);
	});

	it("serves the cached set until the cache is invalidated", async () => {
		const files = new Map<string, string>();
		const snapshots = await withLedger(files, (ledger) =>
			Effect.gen(function* () {
				const before = yield* ledger.getApplied();
				markApplied(files, "000-a");
				const stale = yield* ledger.getApplied();
				yield* ledger.invalidateCache();
				const fresh = yield* ledger.getApplied();
				return [before, stale, fresh].map((set) => [...set]);
			}),
		);
		expect(snapshots).toEqual([[], [], ["000-a"]]);
	});
});

describe("MigrationLedger.record", () => {
	it("writes metadata, change summary, diff and transcript", async () => {
		const files = new Map<string, string>();
		const paths = await withLedger(files, (ledger) =>
			ledger.record(descriptorFor("000-a"), completedResult("000-a"), {
				metadata: testMetadata,
				executedAt,
				diff: Option.some("diff --git a/x b/x\n"),
			}),
		);

		expect(paths).toEqual({
			directory: `${LEDGER_ROOT}/000-a`,
			metadata: `${LEDGER_ROOT}/000-a/metadata.json`,
			changes: `${LEDGER_ROOT}/000-a/changes.json`,
			diff: `${LEDGER_ROOT}/000-a/changes.diff`,
			logs: `${LEDGER_ROOT}/000-a/logs.txt`,
		});

		expect(JSON.parse(files.get(paths.metadata) ?? "")).toEqual({
			migration_name: "000-a",
			author: "test-author",
			date: "2024-01-15",
			description: "Test migration",
			executed_at: "2024-01-15T10:00:00.000Z",
			duration_seconds: 2.5,
			entities_created: 3,
			relationships_created: 1,
			status: "completed",
			changes: {
				entities_created: 3,
				relationships_created: 1,
				versions_created: 4,
				has_diff: true,
			},
		});

		expect(JSON.parse(files.get(paths.changes) ?? "")).toEqual({
			entities_created: 3,
			relationships_created: 1,
			versions_created: 4,
			summary: "Created 3 entities and 1 relationships",
		});

		expect(files.get(`${LEDGER_ROOT}/000-a/changes.diff`)).toBe(
			"diff --git a/x b/x\n",
		);

		const separator = "=".repeat(80);
		expect(files.get(paths.logs)).toBe(
			[
				"Migration: 000-a",
				"Executed at: 2024-01-15T10:00:00.000Z",
				"Duration: 2.5s",
				"",
				separator,
				"Execution Logs:",
				separator,
				"",
				"line one",
				"line two",
				"",
			].join("\n"),
		);
	});

	it("omits the diff file when no diff was captured", async () => {
		const files = new Map<string, string>();
		const paths = await withLedger(files, (ledger) =>
			ledger.record(descriptorFor("000-a"), completedResult("000-a"), {
				metadata: testMetadata,
				executedAt,
				diff: Option.none(),
			}),
		);
		expect(paths.diff).toBeNull();
		expect(files.has(`${LEDGER_ROOT}/000-a/changes.diff`)).toBe(false);
		expect(JSON.parse(files.get(paths.metadata) ?? "").changes.has_diff).toBe(false);
	});

	it("drops the previous diff when a re-run captures none", async () => {
		const files = new Map<string, string>();
		const entry = await withLedger(files, (ledger) =>
			Effect.gen(function* () {
				yield* ledger.record(descriptorFor("000-a"), completedResult("000-a"), {
					metadata: testMetadata,
					executedAt,
					diff: Option.some("diff --git a/x b/x\n"),
				});
				yield* ledger.record(descriptorFor("000-a"), completedResult("000-a"), {
					metadata: testMetadata,
					executedAt,
					diff: Option.none(),
				});
				return yield* ledger.readEntry("000-a");
			}),
		);

		expect(files.has(`${LEDGER_ROOT}/000-a/changes.diff`)).toBe(false);
		expect(Option.isSome(entry) && entry.value.hasDiff).toBe(false);
	});

	it("fails with LedgerWriteError when the ledger directory cannot be created", async () => {
		const files = new Map<string, string>([[LEDGER_ROOT, "not a directory"]]);
		const outcome = await withLedger(files, (ledger) =>
			ledger
				.record(descriptorFor("000-a"), completedResult("000-a"), {
					metadata: testMetadata,
					executedAt,
					diff: Option.none(),
				})
				.pipe(Effect.either),
		);

		expect(Either.isLeft(outcome)).toBe(true);
		if (Either.isLeft(outcome)) {
			expect(outcome.left._tag).toBe("LedgerWriteError");
			expect(outcome.left.phase).toBe("logging");
			expect(outcome.left.migration).toBe("000-a");
			expect(outcome.left.message).toContain("Failed to store migration log for 000-a");
		}
		expect(files.has(`${LEDGER_ROOT}/000-a/metadata.json`)).toBe(false);
	});

	it("leaves the applied cache untouched", async () => {
		const files = new Map<string, string>();
		const snapshots = await withLedger(files, (ledger) =>
			Effect.gen(function* () {
				const before = yield* ledger.getApplied();
				yield* ledger.record(descriptorFor("000-a"), completedResult("000-a"), {
					metadata: testMetadata,
					executedAt,
					diff: Option.none(),
				});
				const cached = yield* ledger.getApplied();
				yield* ledger.invalidateCache();
				const fresh = yield* ledger.getApplied();
				return [before, cached, fresh].map((set) => [...set]);
			}),
		);
		expect(snapshots).toEqual([[], [], ["000-a"]]);
	});
});

describe("MigrationLedger.readEntry", () => {
	it("returns none for a migration without a ledger entry", async () => {
		const entry = await withLedger(new Map(), (ledger) => ledger.readEntry("000-a"));
		expect(Option.isNone(entry)).toBe(true);
	});

	it("decodes a recorded entry", async () => {
		const files = new Map<string, string>();
		const entry = await withLedger(files, (ledger) =>
			ledger
				.record(descriptorFor("000-a"), completedResult("000-a"), {
					metadata: testMetadata,
					executedAt,
					diff: Option.some("diff"),
				})
				.pipe(Effect.zipRight(ledger.readEntry("000-a"))),
		);

		expect(Option.isSome(entry)).toBe(true);
		if (Option.isSome(entry)) {
			expect(entry.value.metadata.status).toBe("completed");
			expect(entry.value.changes?.summary).toBe(
				"Created 3 entities and 1 relationships",
			);
			expect(entry.value.hasDiff).toBe(true);
		}
	});

	it("fails with LedgerDecodeError for a malformed metadata record", async () => {
		const files = new Map<string, string>([
			[`${LEDGER_ROOT}/000-a/metadata.json`, JSON.stringify({ status: "done" })],
		]);
		const outcome = await withLedger(files, (ledger) =>
			ledger.readEntry("000-a").pipe(Effect.either),
		);
		expect(Either.isLeft(outcome) && outcome.left._tag).toBe("LedgerDecodeError");
	});
});
