/**
 * Version records are plain files under the storage root, whatever tracks
 * the tree's checkpoints.
 */

import { StateCheckError } from "@civic-ledger/core";
import { Effect } from "effect";
import { glob } from "glob";

export const DEFAULT_VERSION_PATTERN = "version/**/*.json";

export const countVersionRecordFiles = (
	root: string,
	pattern: string = DEFAULT_VERSION_PATTERN,
): Effect.Effect<number, StateCheckError> =>
	Effect.tryPromise({
		try: () => glob(pattern, { cwd: root, nodir: true }),
		catch: (error) =>
			new StateCheckError({
				root,
				operation: "count",
				message: `Failed to count version records: ${error instanceof Error ? error.message : String(error)}`,
				cause: error,
			}),
	}).pipe(Effect.map((files) => files.length));
