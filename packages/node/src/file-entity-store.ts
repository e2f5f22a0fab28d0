/**
 * JSON-file entity store: the database, publication and search collaborators
 * over a storage tree laid out as
 *
 *   <root>/entity/<type>/<slug>.json
 *   <root>/relationship/<id>.json
 *   <root>/version/<entity|relationship>/<id>/<n>.json
 *   <root>/author/<id>.json
 *
 * Ids are URI-encoded where they become path segments.
 */

import { join } from "node:path";
import {
	type Author,
	CollaboratorError,
	type Entity,
	EntityDatabase,
	type EntityType,
	PublicationService,
	type Relationship,
	SearchService,
	StorageAdapter,
	ScrapingService,
	type StorageAdapterShape,
} from "@civic-ledger/core";
import { Context, Effect, Layer, Schema } from "effect";

// ============================================================================
// Record Schemas
// ============================================================================

const EntityRecord = Schema.Struct({
	id: Schema.String,
	type: Schema.Literal("person", "organization", "location"),
	subType: Schema.NullOr(Schema.String),
	data: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
	versionNumber: Schema.Number,
});

const RelationshipRecord = Schema.Struct({
	id: Schema.String,
	sourceId: Schema.String,
	targetId: Schema.String,
	type: Schema.String,
	versionNumber: Schema.Number,
});

const ENTITY_TYPES: ReadonlyArray<EntityType> = [
	"person",
	"organization",
	"location",
];

interface VersionRecord {
	readonly recordId: string;
	readonly versionNumber: number;
	readonly authorId: string;
	readonly changeDescription: string;
	readonly createdAt: string;
	readonly snapshot: Entity | Relationship;
}

// ============================================================================
// Helpers
// ============================================================================

type Collaborator = CollaboratorError["collaborator"];

const failWith =
	(collaborator: Collaborator, operation: string) =>
	(error: { readonly message: string }) =>
		new CollaboratorError({
			collaborator,
			operation,
			message: error.message,
			cause: error,
		});

const toJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

const slugOf = (data: Readonly<Record<string, unknown>>): string | undefined =>
	typeof data.slug === "string" && /^[a-z0-9-]+$/.test(data.slug)
		? data.slug
		: undefined;

const makeFileStore = (root: string, storage: StorageAdapterShape) => {
	const entityPath = (type: EntityType, slug: string) =>
		join(root, "entity", type, `${slug}.json`);
	const relationshipPath = (id: string) =>
		join(root, "relationship", `${encodeURIComponent(id)}.json`);
	const versionPath = (
		kind: "entity" | "relationship",
		recordId: string,
		versionNumber: number,
	) =>
		join(root, "version", kind, encodeURIComponent(recordId), `${versionNumber}.json`);
	const authorPath = (id: string) =>
		join(root, "author", `${encodeURIComponent(id)}.json`);

	const listJsonFiles = (directory: string) =>
		Effect.gen(function* () {
			const present = yield* storage.exists(directory);
			if (!present) return [];
			const entries = yield* storage.list(directory);
			return entries
				.filter((entry) => entry.kind === "file" && entry.name.endsWith(".json"))
				.map((entry) => join(directory, entry.name))
				.sort();
		});

	const readRecord = <A, I>(path: string, schema: Schema.Schema<A, I>) =>
		storage.read(path).pipe(
			Effect.flatMap((raw) =>
				Effect.try({
					try: (): unknown => JSON.parse(raw),
					catch: (error) => ({
						message: `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
					}),
				}),
			),
			Effect.flatMap((json) =>
				Schema.decodeUnknown(schema)(json).pipe(
					Effect.mapError((error) => ({
						message: `Unexpected record in ${path}: ${error.message}`,
					})),
				),
			),
		);

	const readEntities = (type?: EntityType) =>
		Effect.gen(function* () {
			const types = type === undefined ? ENTITY_TYPES : [type];
			const entities: Entity[] = [];
			for (const entityType of types) {
				for (const path of yield* listJsonFiles(join(root, "entity", entityType))) {
					entities.push(yield* readRecord(path, EntityRecord));
				}
			}
			return entities;
		});

	const writeVersion = (
		kind: "entity" | "relationship",
		snapshot: Entity | Relationship,
		authorId: string,
		changeDescription: string,
	) =>
		Effect.gen(function* () {
			const record: VersionRecord = {
				recordId: snapshot.id,
				versionNumber: snapshot.versionNumber,
				authorId,
				changeDescription,
				createdAt: new Date().toISOString(),
				snapshot,
			};
			yield* storage.write(
				versionPath(kind, snapshot.id, snapshot.versionNumber),
				toJson(record),
			);
		});

	return {
		entityPath,
		relationshipPath,
		authorPath,
		listJsonFiles,
		readRecord,
		readEntities,
		writeVersion,
	};
};

// ============================================================================
// Layer
// ============================================================================

/**
 * Database, publication and search collaborators over JSON files under
 * `root`. Scraping is not included.
 */
export const makeFileEntityStoreLayer = (
	root: string,
): Layer.Layer<EntityDatabase | PublicationService | SearchService, never, StorageAdapter> =>
	Layer.effectContext(
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const store = makeFileStore(root, storage);

			const database = EntityDatabase.of({
				listEntities: (query) =>
					store.readEntities(query.entityType).pipe(
						Effect.map((entities) =>
							entities
								.filter(
									(entity) =>
										query.subType === undefined || entity.subType === query.subType,
								)
								.slice(0, query.limit),
						),
						Effect.mapError(failWith("database", "listEntities")),
					),
				listRelationships: (query) =>
					Effect.gen(function* () {
						const paths = yield* store.listJsonFiles(join(root, "relationship"));
						const relationships: Relationship[] = [];
						for (const path of paths.slice(0, query.limit)) {
							relationships.push(yield* store.readRecord(path, RelationshipRecord));
						}
						return relationships;
					}).pipe(Effect.mapError(failWith("database", "listRelationships"))),
				putAuthor: (author: Author) =>
					storage
						.write(store.authorPath(author.id), toJson(author))
						.pipe(
							Effect.as(author),
							Effect.mapError(failWith("database", "putAuthor")),
						),
			});

			const publication = PublicationService.of({
				createEntity: (input) =>
					Effect.gen(function* () {
						const slug = slugOf(input.entityData);
						if (slug === undefined) {
							return yield* Effect.fail({
								message: "Entity data must include a kebab-case 'slug'",
							});
						}
						const path = store.entityPath(input.entityType, slug);
						if (yield* storage.exists(path)) {
							return yield* Effect.fail({
								message: `Entity already exists: entity:${input.entityType}/${slug}`,
							});
						}
						const entity: Entity = {
							id: `entity:${input.entityType}/${slug}`,
							type: input.entityType,
							subType: input.entitySubType ?? null,
							data: input.entityData,
							versionNumber: 1,
						};
						yield* storage.write(path, toJson(entity));
						yield* store.writeVersion(
							"entity",
							entity,
							input.authorId,
							input.changeDescription,
						);
						return entity;
					}).pipe(Effect.mapError(failWith("publication", "createEntity"))),

				updateEntity: (entity, input) =>
					Effect.gen(function* () {
						const slug = slugOf(entity.data);
						if (slug === undefined) {
							return yield* Effect.fail({
								message: `Entity ${entity.id} has no kebab-case 'slug'`,
							});
						}
						const path = store.entityPath(entity.type, slug);
						const current = yield* store.readRecord(path, EntityRecord);
						const updated: Entity = {
							...entity,
							versionNumber: current.versionNumber + 1,
						};
						yield* storage.write(path, toJson(updated));
						yield* store.writeVersion(
							"entity",
							updated,
							input.authorId,
							input.changeDescription,
						);
						return updated;
					}).pipe(Effect.mapError(failWith("publication", "updateEntity"))),

				createRelationship: (input) =>
					Effect.gen(function* () {
						const relationship: Relationship = {
							id: `relationship:${input.sourceId}:${input.targetId}:${input.relationshipType}`,
							sourceId: input.sourceId,
							targetId: input.targetId,
							type: input.relationshipType,
							versionNumber: 1,
						};
						const path = store.relationshipPath(relationship.id);
						if (yield* storage.exists(path)) {
							return yield* Effect.fail({
								message: `Relationship already exists: ${relationship.id}`,
							});
						}
						yield* storage.write(path, toJson(relationship));
						yield* store.writeVersion(
							"relationship",
							relationship,
							input.authorId,
							input.changeDescription,
						);
						return relationship;
					}).pipe(Effect.mapError(failWith("publication", "createRelationship"))),
			});

			const search = SearchService.of({
				searchEntities: (query) =>
					store.readEntities(query.entityType).pipe(
						Effect.map((entities) => {
							const needle = query.query?.toLowerCase();
							return entities
								.filter(
									(entity) =>
										(query.subType === undefined ||
											entity.subType === query.subType) &&
										(needle === undefined ||
											JSON.stringify(entity.data).toLowerCase().includes(needle)),
								)
								.slice(0, query.limit ?? 100);
						}),
						Effect.mapError(failWith("search", "searchEntities")),
					),
			});

			return Context.empty().pipe(
				Context.add(EntityDatabase, database),
				Context.add(PublicationService, publication),
				Context.add(SearchService, search),
			);
		}),
	);

const unconfigured = (operation: string) =>
	Effect.fail(
		new CollaboratorError({
			collaborator: "scraping",
			operation,
			message: "No scraping provider configured",
		}),
	);

/**
 * Scraping stand-in for hosts without a text-generation provider. Every
 * call fails; migrations that do not scrape are unaffected.
 */
export const UnconfiguredScrapingLayer = Layer.succeed(ScrapingService, {
	generateText: () => unconfigured("generateText"),
	extractStructuredData: () => unconfigured("extractStructuredData"),
});
