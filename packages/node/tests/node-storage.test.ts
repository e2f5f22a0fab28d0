/**
 * Node adapter storage tests against a temporary directory.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StorageAdapter, StorageError } from "@civic-ledger/core";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeNodeStorageLayer } from "../src/node-adapter-layer.js";

// ============================================================================
// Helpers
// ============================================================================

const layer = makeNodeStorageLayer({ maxRetries: 0 });

const run = <A, E>(effect: Effect.Effect<A, E, StorageAdapter>) =>
	Effect.runPromise(Effect.provide(effect, layer));

const runExit = <A, E>(effect: Effect.Effect<A, E, StorageAdapter>) =>
	Effect.runPromise(Effect.either(Effect.provide(effect, layer)));

let tempDir: string;

beforeEach(async () => {
	tempDir = join(tmpdir(), `civic-ledger-test-${randomBytes(8).toString("hex")}`);
	await fs.mkdir(tempDir, { recursive: true });
});

afterEach(async () => {
	await fs.rm(tempDir, { recursive: true, force: true });
});

// ============================================================================
// Node Storage Adapter Tests
// ============================================================================

describe("NodeStorageLayer (filesystem)", () => {
	it("writes a file and reads it back", async () => {
		const path = join(tempDir, "entity.json");
		const content = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.write(path, '{"slug":"springfield"}\n');
				return yield* storage.read(path);
			}),
		);

		expect(content).toBe('{"slug":"springfield"}\n');
		expect(await fs.readFile(path, "utf-8")).toBe('{"slug":"springfield"}\n');
	});

	it("creates missing parent directories on write", async () => {
		const path = join(tempDir, "entity", "location", "springfield.json");
		await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.write(path, "{}");
			}),
		);

		const stat = await fs.stat(join(tempDir, "entity", "location"));
		expect(stat.isDirectory()).toBe(true);
	});

	it("leaves no temporary files behind after a write", async () => {
		await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.write(join(tempDir, "a.json"), "1");
				yield* storage.write(join(tempDir, "a.json"), "2");
			}),
		);

		expect(await fs.readdir(tempDir)).toEqual(["a.json"]);
		expect(await fs.readFile(join(tempDir, "a.json"), "utf-8")).toBe("2");
	});

	it("reports existence for files and directories", async () => {
		await fs.mkdir(join(tempDir, "logs"));
		await fs.writeFile(join(tempDir, "present.txt"), "x");

		const result = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				return [
					yield* storage.exists(join(tempDir, "present.txt")),
					yield* storage.exists(join(tempDir, "logs")),
					yield* storage.exists(join(tempDir, "absent.txt")),
					yield* storage.exists(join(tempDir, "present.txt", "child")),
				];
			}),
		);

		expect(result).toEqual([true, true, false, false]);
	});

	it("lists immediate children with their kind", async () => {
		await fs.mkdir(join(tempDir, "001-first"));
		await fs.writeFile(join(tempDir, "README.md"), "notes");

		const entries = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				return yield* storage.list(tempDir);
			}),
		);

		expect(
			[...entries].sort((a, b) => a.name.localeCompare(b.name)),
		).toEqual([
			{ name: "001-first", kind: "directory" },
			{ name: "README.md", kind: "file" },
		]);
	});

	it("creates nested directories", async () => {
		const path = join(tempDir, "migration-logs", "001-first");
		await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.makeDirectory(path);
				yield* storage.makeDirectory(path);
			}),
		);

		expect((await fs.stat(path)).isDirectory()).toBe(true);
	});

	it("removes a file", async () => {
		const path = join(tempDir, "doomed.txt");
		await fs.writeFile(path, "x");

		await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.remove(path);
			}),
		);

		await expect(fs.access(path)).rejects.toThrow();
	});

	it("fails a read of a missing file with StorageError", async () => {
		const path = join(tempDir, "missing.json");
		const result = await runExit(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				return yield* storage.read(path);
			}),
		);

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toBeInstanceOf(StorageError);
			expect(result.left.path).toBe(path);
			expect(result.left.operation).toBe("read");
		}
	});

	it("fails a listing of a missing directory", async () => {
		const path = join(tempDir, "nowhere");
		const result = await runExit(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				return yield* storage.list(path);
			}),
		);

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left.operation).toBe("list");
		}
	});
});
