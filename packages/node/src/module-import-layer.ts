/**
 * Module source that evaluates entry scripts from disk with dynamic
 * `import()`. Each load appends a fresh query string so a re-run picks up
 * edits instead of the module cache.
 */

import { access } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import {
	LoadError,
	MigrationModuleSource,
	type MigrationDescriptor,
	toLoadError,
} from "@civic-ledger/core";
import { Effect, Layer } from "effect";

let loadCounter = 0;

const moduleUrl = (entryScript: string): string => {
	loadCounter += 1;
	return `${pathToFileURL(entryScript).href}?t=${Date.now()}-${loadCounter}`;
};

const missingScript = (descriptor: MigrationDescriptor) =>
	new LoadError({
		migration: descriptor.fullName,
		phase: "load",
		scriptPath: descriptor.entryScript,
		reason: "missing-script",
		message: `Migration script not found: ${descriptor.entryScript}`,
	});

export const DynamicImportModuleSourceLayer: Layer.Layer<MigrationModuleSource> =
	Layer.succeed(MigrationModuleSource, {
		importModule: (descriptor) =>
			Effect.tryPromise({
				try: () => access(descriptor.entryScript),
				catch: () => missingScript(descriptor),
			}).pipe(
				Effect.zipRight(
					Effect.tryPromise({
						try: (): Promise<unknown> => import(moduleUrl(descriptor.entryScript)),
						catch: (error) => toLoadError(descriptor, error),
					}),
				),
			),
	});
