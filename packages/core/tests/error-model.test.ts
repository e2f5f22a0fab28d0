import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	CollaboratorError,
	ContextFileError,
	ContractError,
	DiscoveryWarning,
	LedgerDecodeError,
	LedgerWriteError,
	LoadError,
	MigrationExecutionError,
	type MigrationFailure,
	PreconditionError,
	StateCheckError,
	StorageError,
} from "../src/errors/index.js";

describe("Migration error creation and _tag discrimination", () => {
	it("LoadError has correct _tag and fields", () => {
		const err = new LoadError({
			migration: "000-a",
			phase: "load",
			scriptPath: "/m/000-a/migrate.ts",
			reason: "missing-script",
			message: "not found",
		});
		expect(err._tag).toBe("LoadError");
		expect(err.reason).toBe("missing-script");
		expect(err.scriptPath).toBe("/m/000-a/migrate.ts");
		expect(err).toBeInstanceOf(Error);
	});

	it("ContractError carries every missing field", () => {
		const err = new ContractError({
			migration: "000-a",
			phase: "load",
			reason: "missing-metadata",
			missingFields: ["author", "date"],
			message: "missing",
		});
		expect(err._tag).toBe("ContractError");
		expect(err.missingFields).toEqual(["author", "date"]);
	});

	it("PreconditionError has correct _tag and phase", () => {
		const err = new PreconditionError({
			migration: "000-a",
			phase: "precondition",
			reason: "uncommitted-changes",
			message: "dirty",
		});
		expect(err._tag).toBe("PreconditionError");
		expect(err.phase).toBe("precondition");
	});

	it("MigrationExecutionError keeps the trace text", () => {
		const err = new MigrationExecutionError({
			migration: "000-a",
			phase: "execution",
			message: "failed",
			trace: "Error: failed\n    at migrate",
		});
		expect(err._tag).toBe("MigrationExecutionError");
		expect(err.trace).toContain("at migrate");
	});

	it("LedgerWriteError and LedgerDecodeError carry the path", () => {
		const write = new LedgerWriteError({
			migration: "000-a",
			phase: "logging",
			path: "/data/migration-logs/000-a",
			message: "denied",
		});
		const decode = new LedgerDecodeError({
			migration: "000-a",
			path: "/data/migration-logs/000-a/metadata.json",
			message: "bad record",
		});
		expect(write._tag).toBe("LedgerWriteError");
		expect(write.path).toBe("/data/migration-logs/000-a");
		expect(decode._tag).toBe("LedgerDecodeError");
	});

	it("DiscoveryWarning is a value, not an error", () => {
		const warning = new DiscoveryWarning({
			folder: "bad",
			reason: "invalid-name",
			message: "skipped",
		});
		expect(warning._tag).toBe("DiscoveryWarning");
		expect(warning).not.toBeInstanceOf(Error);
	});
});

describe("Storage and collaborator errors", () => {
	it("StorageError and StateCheckError have correct _tag", () => {
		const storage = new StorageError({
			path: "/x",
			operation: "mkdir",
			message: "denied",
		});
		const state = new StateCheckError({
			root: "/data",
			operation: "status",
			message: "not a repository",
		});
		expect(storage._tag).toBe("StorageError");
		expect(state._tag).toBe("StateCheckError");
		expect(state.operation).toBe("status");
	});

	it("CollaboratorError and ContextFileError have correct _tag", () => {
		const collaborator = new CollaboratorError({
			collaborator: "publication",
			operation: "createEntity",
			message: "duplicate",
		});
		const file = new ContextFileError({
			path: "/m/000-a/data.csv",
			reason: "not-found",
			message: "missing",
		});
		expect(collaborator._tag).toBe("CollaboratorError");
		expect(file.reason).toBe("not-found");
	});
});

describe("Effect.catchTag pattern matching", () => {
	const failWith = (error: MigrationFailure): Effect.Effect<string, MigrationFailure> =>
		Effect.fail(error);

	it("catchTag selects the matching failure", async () => {
		const effect = failWith(
			new LedgerWriteError({
				migration: "000-a",
				phase: "logging",
				path: "/p",
				message: "denied",
			}),
		).pipe(
			Effect.catchTag("LedgerWriteError", (err) =>
				Effect.succeed(`ledger write failed at ${err.path}`),
			),
		);
		expect(await Effect.runPromise(effect)).toBe("ledger write failed at /p");
	});

	it("unmatched tags propagate", async () => {
		const effect = failWith(
			new LoadError({
				migration: "000-a",
				phase: "load",
				scriptPath: "/p",
				reason: "evaluation-error",
				message: "boom",
			}),
		).pipe(
			Effect.catchTag("ContractError", () => Effect.succeed("should not happen")),
		);
		const either = await Effect.runPromise(Effect.either(effect));
		expect(either._tag).toBe("Left");
	});

	it("every failure reports its phase", () => {
		const failures: ReadonlyArray<MigrationFailure> = [
			new LoadError({
				migration: "a",
				phase: "load",
				scriptPath: "/p",
				reason: "syntax-error",
				message: "m",
			}),
			new PreconditionError({
				migration: "a",
				phase: "precondition",
				reason: "state-check-failed",
				message: "m",
			}),
			new MigrationExecutionError({
				migration: "a",
				phase: "execution",
				message: "m",
				trace: "",
			}),
		];
		expect(failures.map((failure) => failure.phase)).toEqual([
			"load",
			"precondition",
			"execution",
		]);
	});
});
