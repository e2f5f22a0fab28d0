import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	StateCheckError,
	StorageState,
	type StorageStateShape,
} from "@civic-ledger/core";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	type GitCommandResult,
	type GitRunner,
	makeGitStorageStateLayer,
} from "../src/git-storage-state-layer.js";

const ROOT = "/repo/data";

const ok = (stdout = ""): GitCommandResult => ({ exitCode: 0, stdout, stderr: "" });

/**
 * A git runner answering from a table keyed by the joined argument list.
 * Unknown commands exit 0 with no output.
 */
const scriptedGit = (answers: Readonly<Record<string, GitCommandResult>> = {}) => {
	const calls: Array<{ args: ReadonlyArray<string>; cwd: string }> = [];
	const runGit: GitRunner = async (args, cwd) => {
		calls.push({ args, cwd });
		return answers[args.join(" ")] ?? ok();
	};
	return { calls, runGit };
};

const runState = <A, E>(
	runGit: GitRunner,
	use: (state: StorageStateShape) => Effect.Effect<A, E>,
	root = ROOT,
) =>
	Effect.runPromise(
		Effect.either(
			Effect.flatMap(StorageState, use).pipe(
				Effect.provide(makeGitStorageStateLayer({ root, runGit })),
			),
		),
	);

describe("git storage state: isClean", () => {
	it("is clean when status prints nothing", async () => {
		const { calls, runGit } = scriptedGit();
		const result = await runState(runGit, (state) => state.isClean());

		expect(result._tag === "Right" ? result.right : undefined).toBe(true);
		expect(calls).toEqual([
			{ args: ["status", "--porcelain", "--", "."], cwd: ROOT },
		]);
	});

	it("is dirty when status lists a change", async () => {
		const { runGit } = scriptedGit({
			"status --porcelain -- .": ok(" M entity/location/springfield.json\n"),
		});
		const result = await runState(runGit, (state) => state.isClean());

		expect(result._tag === "Right" ? result.right : undefined).toBe(false);
	});

	it("fails with StateCheckError when git exits non-zero", async () => {
		const { runGit } = scriptedGit({
			"status --porcelain -- .": {
				exitCode: 128,
				stdout: "",
				stderr: "fatal: not a git repository\n",
			},
		});
		const result = await runState(runGit, (state) => state.isClean());

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toBeInstanceOf(StateCheckError);
			expect(result.left.operation).toBe("status");
			expect(result.left.message).toBe(
				"git status exited with code 128: fatal: not a git repository",
			);
		}
	});

	it("fails with StateCheckError when git cannot be started", async () => {
		const runGit: GitRunner = async () => {
			throw new Error("spawn git ENOENT");
		};
		const result = await runState(runGit, (state) => state.isClean());

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left.message).toBe("Failed to run git status: spawn git ENOENT");
		}
	});
});

describe("git storage state: captureDiff", () => {
	it("returns none when nothing changed", async () => {
		const { runGit } = scriptedGit();
		const result = await runState(runGit, (state) => state.captureDiff());

		expect(result._tag === "Right" && Option.isNone(result.right)).toBe(true);
	});

	it("joins tracked changes with untracked files shown as additions", async () => {
		const { calls, runGit } = scriptedGit({
			"diff HEAD -- .": ok("diff --git a/x.json b/x.json\n-old\n+new\n"),
			"ls-files --others --exclude-standard -- .": ok("entity/location/a.json\n"),
			"diff --no-index -- /dev/null entity/location/a.json": {
				exitCode: 1,
				stdout: "diff --git a/entity/location/a.json b/entity/location/a.json\n+{}",
				stderr: "",
			},
		});
		const result = await runState(runGit, (state) => state.captureDiff());

		expect(result._tag === "Right" ? Option.getOrUndefined(result.right) : undefined).toBe(
			"diff --git a/x.json b/x.json\n-old\n+new\n" +
				"diff --git a/entity/location/a.json b/entity/location/a.json\n+{}\n",
		);
		expect(calls.map((call) => call.args[0])).toEqual(["diff", "ls-files", "diff"]);
	});

	it("never stages anything", async () => {
		const { calls, runGit } = scriptedGit({
			"ls-files --others --exclude-standard -- .": ok("a.json\nb.json\n"),
		});
		await runState(runGit, (state) => state.captureDiff());

		expect(calls.some((call) => call.args[0] === "add")).toBe(false);
		expect(calls).toHaveLength(4);
	});
});

describe("git storage state: checkpoint", () => {
	it("stages and commits the storage root with the message", async () => {
		const { calls, runGit } = scriptedGit();
		const result = await runState(runGit, (state) =>
			state.checkpoint("Apply migration 001-seed"),
		);

		expect(result._tag).toBe("Right");
		expect(calls.map((call) => call.args)).toEqual([
			["add", "--all", "--", "."],
			["commit", "--quiet", "--message", "Apply migration 001-seed", "--", "."],
		]);
	});

	it("does not commit when staging fails", async () => {
		const { calls, runGit } = scriptedGit({
			"add --all -- .": { exitCode: 1, stdout: "", stderr: "index.lock exists" },
		});
		const result = await runState(runGit, (state) => state.checkpoint("msg"));

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left.operation).toBe("commit");
		}
		expect(calls).toHaveLength(1);
	});
});

describe("git storage state: countVersionRecords", () => {
	it("counts JSON files under version/", async () => {
		const root = join(tmpdir(), `civic-ledger-git-${randomBytes(8).toString("hex")}`);
		await fs.mkdir(join(root, "version", "entity", "a"), { recursive: true });
		await fs.mkdir(join(root, "version", "relationship", "b"), { recursive: true });
		await fs.writeFile(join(root, "version", "entity", "a", "1.json"), "{}");
		await fs.writeFile(join(root, "version", "entity", "a", "2.json"), "{}");
		await fs.writeFile(join(root, "version", "relationship", "b", "1.json"), "{}");
		await fs.writeFile(join(root, "version", "entity", "a", "notes.txt"), "");

		try {
			const { runGit } = scriptedGit();
			const result = await runState(
				runGit,
				(state) => state.countVersionRecords(),
				root,
			);
			expect(result._tag === "Right" ? result.right : undefined).toBe(3);
		} finally {
			await fs.rm(root, { recursive: true, force: true });
		}
	});

	it("counts zero when there is no version directory", async () => {
		const root = join(tmpdir(), `civic-ledger-git-${randomBytes(8).toString("hex")}`);
		await fs.mkdir(root, { recursive: true });
		try {
			const { runGit } = scriptedGit();
			const result = await runState(
				runGit,
				(state) => state.countVersionRecords(),
				root,
			);
			expect(result._tag === "Right" ? result.right : undefined).toBe(0);
		} finally {
			await fs.rm(root, { recursive: true, force: true });
		}
	});
});
