/**
 * StorageState backed by git: the storage root lives inside a git work tree
 * and the last commit is the durable checkpoint.
 */

import { StateCheckError, StorageState } from "@civic-ledger/core";
import { Effect, Layer, Option } from "effect";
import { execa } from "execa";
import { countVersionRecordFiles } from "./version-records.js";

// ============================================================================
// Git runner
// ============================================================================

export interface GitCommandResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Runs `git <args>` in `cwd`. Must resolve for non-zero exits.
 */
export type GitRunner = (
	args: ReadonlyArray<string>,
	cwd: string,
) => Promise<GitCommandResult>;

export const execaGitRunner: GitRunner = async (args, cwd) => {
	const result = await execa("git", [...args], {
		cwd,
		reject: false,
		maxBuffer: 64 * 1024 * 1024,
	});
	return {
		exitCode: result.exitCode,
		stdout: result.stdout,
		stderr: result.stderr,
	};
};

// ============================================================================
// Configuration
// ============================================================================

export interface GitStorageStateConfig {
	/** Storage root; every git query is limited to this path. */
	readonly root: string;
	readonly runGit?: GitRunner;
	/** Glob, relative to `root`, matching version record files. */
	readonly versionPattern?: string;
}

// ============================================================================
// Layer
// ============================================================================

export const makeGitStorageStateLayer = (
	config: GitStorageStateConfig,
): Layer.Layer<StorageState> => {
	const runGit = config.runGit ?? execaGitRunner;
	const root = config.root;

	const git = (
		operation: StateCheckError["operation"],
		args: ReadonlyArray<string>,
		okExitCodes: ReadonlyArray<number> = [0],
	): Effect.Effect<string, StateCheckError> =>
		Effect.tryPromise({
			try: () => runGit(args, root),
			catch: (error) =>
				new StateCheckError({
					root,
					operation,
					message: `Failed to run git ${args[0] ?? ""}: ${error instanceof Error ? error.message : String(error)}`,
					cause: error,
				}),
		}).pipe(
			Effect.flatMap((result) =>
				okExitCodes.includes(result.exitCode)
					? Effect.succeed(result.stdout)
					: Effect.fail(
							new StateCheckError({
								root,
								operation,
								message: `git ${args[0] ?? ""} exited with code ${result.exitCode}: ${result.stderr.trim()}`,
							}),
						),
			),
		);

	const untrackedFiles = git("diff", [
		"ls-files",
		"--others",
		"--exclude-standard",
		"--",
		".",
	]).pipe(
		Effect.map((stdout) =>
			stdout.split("\n").filter((line) => line.length > 0),
		),
	);

	return Layer.succeed(StorageState, {
		isClean: () =>
			git("status", ["status", "--porcelain", "--", "."]).pipe(
				Effect.map((stdout) => stdout.trim().length === 0),
			),

		// Tracked changes against HEAD plus every untracked file as an addition.
		// `git diff --no-index` exits 1 when the inputs differ.
		captureDiff: () =>
			Effect.gen(function* () {
				const tracked = yield* git("diff", ["diff", "HEAD", "--", "."]);
				const untracked = yield* untrackedFiles;
				const additions = yield* Effect.forEach(untracked, (file) =>
					git("diff", ["diff", "--no-index", "--", "/dev/null", file], [0, 1]),
				);
				const diff = [tracked, ...additions]
					.filter((part) => part.length > 0)
					.map((part) => (part.endsWith("\n") ? part : `${part}\n`))
					.join("");
				return diff.length === 0 ? Option.none<string>() : Option.some(diff);
			}),

		countVersionRecords: () =>
			countVersionRecordFiles(root, config.versionPattern),

		checkpoint: (message) =>
			git("commit", ["add", "--all", "--", "."]).pipe(
				Effect.zipRight(
					git("commit", ["commit", "--quiet", "--message", message, "--", "."]),
				),
				Effect.asVoid,
			),
	});
};
