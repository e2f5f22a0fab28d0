/**
 * Execution context handed to a migration body. Collaborator services are
 * exposed as Promise clients that run on the caller's runtime, so the body's
 * calls share the engine's logger and services.
 */

import { isAbsolute, relative, resolve } from "node:path";
import { Cause, Effect, Exit, Runtime } from "effect";
import { ContextFileError } from "../errors/collaborator-errors.js";
import {
	type Collaborators,
	EntityDatabase,
	type EntityDatabaseShape,
	PublicationService,
	type PublicationServiceShape,
	ScrapingService,
	type ScrapingServiceShape,
	SearchService,
	type SearchServiceShape,
} from "../services/collaborators.js";
import { StorageAdapter } from "../storage/storage-service.js";
import type {
	MigrationContext,
	PromiseClient,
	ReadCsvOptions,
} from "../types/context-types.js";
import type { MigrationDescriptor } from "../types/migration-types.js";
import { parseCsv } from "./csv.js";

/**
 * Build a fresh context for one run of `descriptor`.
 */
export const makeMigrationContext = (
	descriptor: MigrationDescriptor,
): Effect.Effect<MigrationContext, never, Collaborators | StorageAdapter> =>
	Effect.gen(function* () {
		const runtime = yield* Effect.runtime<never>();
		const publicationService = yield* PublicationService;
		const searchService = yield* SearchService;
		const scrapingService = yield* ScrapingService;
		const database = yield* EntityDatabase;
		const storage = yield* StorageAdapter;

		const run = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
			Runtime.runPromiseExit(runtime)(effect).then((exit) =>
				Exit.isSuccess(exit)
					? exit.value
					: Promise.reject(Cause.squash(exit.cause)),
			);

		const publication: PromiseClient<PublicationServiceShape> = {
			createEntity: (input) => run(publicationService.createEntity(input)),
			updateEntity: (entity, input) =>
				run(publicationService.updateEntity(entity, input)),
			createRelationship: (input) =>
				run(publicationService.createRelationship(input)),
		};
		const search: PromiseClient<SearchServiceShape> = {
			searchEntities: (query) => run(searchService.searchEntities(query)),
		};
		const scraping: PromiseClient<ScrapingServiceShape> = {
			generateText: (input) => run(scrapingService.generateText(input)),
			extractStructuredData: (input) =>
				run(scrapingService.extractStructuredData(input)),
		};
		const db: PromiseClient<EntityDatabaseShape> = {
			listEntities: (query) => run(database.listEntities(query)),
			listRelationships: (query) => run(database.listRelationships(query)),
			putAuthor: (author) => run(database.putAuthor(author)),
		};

		const logs: string[] = [];

		const readFile = (relativePath: string) =>
			Effect.gen(function* () {
				const path = resolve(descriptor.location, relativePath);
				const inside = relative(descriptor.location, path);
				const present =
					!inside.startsWith("..") && !isAbsolute(inside)
						? yield* storage.exists(path)
						: false;
				if (!present) {
					return yield* Effect.fail(
						new ContextFileError({
							path,
							reason: "not-found",
							message: `File not found in migration folder: ${relativePath}`,
						}),
					);
				}
				return { path, text: yield* storage.read(path) };
			});

		const parseJson = (path: string, text: string) =>
			Effect.try({
				try: (): unknown => JSON.parse(text),
				catch: (error) =>
					new ContextFileError({
						path,
						reason: "parse",
						message: `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
						cause: error,
					}),
			});

		const parseDelimited = (path: string, text: string, delimiter: string) =>
			Effect.try({
				try: () => parseCsv(text, delimiter),
				catch: (error) =>
					new ContextFileError({
						path,
						reason: "parse",
						message: `Invalid CSV in ${path}: ${error instanceof Error ? error.message : String(error)}`,
						cause: error,
					}),
			});

		const context: MigrationContext = {
			publication,
			search,
			scraping,
			db,
			migrationDir: descriptor.location,
			logs,
			log: (message) => {
				logs.push(message);
				Runtime.runSync(runtime)(
					Effect.logInfo(message).pipe(
						Effect.annotateLogs("migration", descriptor.fullName),
					),
				);
			},
			readText: (relativePath) =>
				run(readFile(relativePath).pipe(Effect.map((file) => file.text))),
			readJson: (relativePath) =>
				run(
					readFile(relativePath).pipe(
						Effect.flatMap((file) => parseJson(file.path, file.text)),
					),
				),
			readCsv: (relativePath, options: ReadCsvOptions = {}) =>
				run(
					readFile(relativePath).pipe(
						Effect.flatMap((file) =>
							parseDelimited(file.path, file.text, options.delimiter ?? ","),
						),
					),
				),
		};
		return context;
	});
