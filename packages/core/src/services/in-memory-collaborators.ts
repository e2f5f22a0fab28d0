/**
 * In-memory collaborators for tests: one mutable store shared by the
 * publication, search and database services. Scraping answers from
 * caller-supplied callbacks.
 */

import { Effect, Layer } from "effect";
import { CollaboratorError } from "../errors/collaborator-errors.js";
import type { Author, Entity, Relationship } from "../types/entity-types.js";
import {
	type Collaborators,
	EntityDatabase,
	PublicationService,
	ScrapingService,
	type ScrapingServiceShape,
	SearchService,
} from "./collaborators.js";

export interface InMemoryVersionRecord {
	readonly recordId: string;
	readonly versionNumber: number;
	readonly authorId: string;
	readonly changeDescription: string;
}

export interface InMemoryEntityStore {
	readonly entities: Entity[];
	readonly relationships: Relationship[];
	readonly authors: Author[];
	readonly versions: InMemoryVersionRecord[];
}

export const makeInMemoryEntityStore = (): InMemoryEntityStore => ({
	entities: [],
	relationships: [],
	authors: [],
	versions: [],
});

const slugOf = (data: Readonly<Record<string, unknown>>): string | undefined =>
	typeof data.slug === "string" && data.slug.length > 0 ? data.slug : undefined;

const matchesText = (entity: Entity, text: string): boolean =>
	JSON.stringify(entity.data).toLowerCase().includes(text.toLowerCase());

const unconfiguredScraping: ScrapingServiceShape = {
	generateText: () =>
		Effect.fail(
			new CollaboratorError({
				collaborator: "scraping",
				operation: "generateText",
				message: "No scraping provider configured",
			}),
		),
	extractStructuredData: () =>
		Effect.fail(
			new CollaboratorError({
				collaborator: "scraping",
				operation: "extractStructuredData",
				message: "No scraping provider configured",
			}),
		),
};

/**
 * Provides all four collaborator services over `store`.
 */
export const makeInMemoryCollaboratorsLayer = (
	store: InMemoryEntityStore = makeInMemoryEntityStore(),
	scraping: ScrapingServiceShape = unconfiguredScraping,
): Layer.Layer<Collaborators> => {
	const publication = Layer.succeed(PublicationService, {
		createEntity: (input) =>
			Effect.suspend(() => {
				const slug = slugOf(input.entityData);
				if (slug === undefined) {
					return Effect.fail(
						new CollaboratorError({
							collaborator: "publication",
							operation: "createEntity",
							message: "Entity data must include a non-empty 'slug'",
						}),
					);
				}
				const id = `entity:${input.entityType}/${slug}`;
				if (store.entities.some((entity) => entity.id === id)) {
					return Effect.fail(
						new CollaboratorError({
							collaborator: "publication",
							operation: "createEntity",
							message: `Entity already exists: ${id}`,
						}),
					);
				}
				const entity: Entity = {
					id,
					type: input.entityType,
					subType: input.entitySubType ?? null,
					data: input.entityData,
					versionNumber: 1,
				};
				store.entities.push(entity);
				store.versions.push({
					recordId: id,
					versionNumber: 1,
					authorId: input.authorId,
					changeDescription: input.changeDescription,
				});
				return Effect.succeed(entity);
			}),
		updateEntity: (entity, input) =>
			Effect.suspend(() => {
				const index = store.entities.findIndex((e) => e.id === entity.id);
				if (index === -1) {
					return Effect.fail(
						new CollaboratorError({
							collaborator: "publication",
							operation: "updateEntity",
							message: `Entity not found: ${entity.id}`,
						}),
					);
				}
				const updated: Entity = {
					...entity,
					versionNumber: store.entities[index].versionNumber + 1,
				};
				store.entities[index] = updated;
				store.versions.push({
					recordId: updated.id,
					versionNumber: updated.versionNumber,
					authorId: input.authorId,
					changeDescription: input.changeDescription,
				});
				return Effect.succeed(updated);
			}),
		createRelationship: (input) =>
			Effect.sync(() => {
				const relationship: Relationship = {
					id: `relationship:${input.sourceId}:${input.targetId}:${input.relationshipType}`,
					sourceId: input.sourceId,
					targetId: input.targetId,
					type: input.relationshipType,
					versionNumber: 1,
				};
				store.relationships.push(relationship);
				store.versions.push({
					recordId: relationship.id,
					versionNumber: 1,
					authorId: input.authorId,
					changeDescription: input.changeDescription,
				});
				return relationship;
			}),
	});

	const search = Layer.succeed(SearchService, {
		searchEntities: (query) =>
			Effect.sync(() =>
				store.entities
					.filter(
						(entity) =>
							(query.entityType === undefined ||
								entity.type === query.entityType) &&
							(query.subType === undefined ||
								entity.subType === query.subType) &&
							(query.query === undefined || matchesText(entity, query.query)),
					)
					.slice(0, query.limit ?? 100),
			),
	});

	const database = Layer.succeed(EntityDatabase, {
		listEntities: (query) =>
			Effect.sync(() =>
				store.entities
					.filter(
						(entity) =>
							(query.entityType === undefined ||
								entity.type === query.entityType) &&
							(query.subType === undefined || entity.subType === query.subType),
					)
					.slice(0, query.limit),
			),
		listRelationships: (query) =>
			Effect.sync(() => store.relationships.slice(0, query.limit)),
		putAuthor: (author) =>
			Effect.sync(() => {
				const index = store.authors.findIndex((a) => a.id === author.id);
				if (index === -1) {
					store.authors.push(author);
				} else {
					store.authors[index] = author;
				}
				return author;
			}),
	});

	return Layer.mergeAll(
		publication,
		search,
		database,
		Layer.succeed(ScrapingService, scraping),
	);
};
