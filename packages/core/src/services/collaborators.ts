import { Context, type Effect } from "effect";
import type { CollaboratorError } from "../errors/collaborator-errors.js";
import type {
	Author,
	Entity,
	EntityType,
	Relationship,
} from "../types/entity-types.js";

// ============================================================================
// Publication
// ============================================================================

export interface CreateEntityInput {
	readonly entityType: EntityType;
	readonly entitySubType?: string | null;
	readonly entityData: Readonly<Record<string, unknown>>;
	readonly authorId: string;
	readonly changeDescription: string;
}

export interface UpdateEntityInput {
	readonly authorId: string;
	readonly changeDescription: string;
}

export interface CreateRelationshipInput {
	readonly sourceId: string;
	readonly targetId: string;
	readonly relationshipType: string;
	readonly authorId: string;
	readonly changeDescription: string;
}

/**
 * Creates and updates records, each write producing a version record.
 */
export interface PublicationServiceShape {
	readonly createEntity: (
		input: CreateEntityInput,
	) => Effect.Effect<Entity, CollaboratorError>;
	readonly updateEntity: (
		entity: Entity,
		input: UpdateEntityInput,
	) => Effect.Effect<Entity, CollaboratorError>;
	readonly createRelationship: (
		input: CreateRelationshipInput,
	) => Effect.Effect<Relationship, CollaboratorError>;
}

export class PublicationService extends Context.Tag("PublicationService")<
	PublicationService,
	PublicationServiceShape
>() {}

// ============================================================================
// Search
// ============================================================================

export interface SearchQuery {
	readonly query?: string;
	readonly entityType?: EntityType;
	readonly subType?: string;
	readonly limit?: number;
}

export interface SearchServiceShape {
	readonly searchEntities: (
		query: SearchQuery,
	) => Effect.Effect<ReadonlyArray<Entity>, CollaboratorError>;
}

export class SearchService extends Context.Tag("SearchService")<
	SearchService,
	SearchServiceShape
>() {}

// ============================================================================
// Database (direct read access)
// ============================================================================

export interface ListEntitiesQuery {
	readonly limit: number;
	readonly entityType?: EntityType;
	readonly subType?: string;
}

export interface ListRelationshipsQuery {
	readonly limit: number;
}

export interface EntityDatabaseShape {
	readonly listEntities: (
		query: ListEntitiesQuery,
	) => Effect.Effect<ReadonlyArray<Entity>, CollaboratorError>;
	readonly listRelationships: (
		query: ListRelationshipsQuery,
	) => Effect.Effect<ReadonlyArray<Relationship>, CollaboratorError>;
	readonly putAuthor: (author: Author) => Effect.Effect<Author, CollaboratorError>;
}

export class EntityDatabase extends Context.Tag("EntityDatabase")<
	EntityDatabase,
	EntityDatabaseShape
>() {}

// ============================================================================
// Scraping / LLM
// ============================================================================

export interface GenerateTextInput {
	readonly prompt: string;
	readonly systemPrompt?: string;
	readonly temperature?: number;
}

export interface ExtractStructuredDataInput {
	readonly text: string;
	readonly schema: Readonly<Record<string, unknown>>;
	readonly instructions: string;
}

/**
 * Text generation and structured extraction used by migration bodies for
 * translation and normalization. The engine never calls it.
 */
export interface ScrapingServiceShape {
	readonly generateText: (
		input: GenerateTextInput,
	) => Effect.Effect<string, CollaboratorError>;
	readonly extractStructuredData: (
		input: ExtractStructuredDataInput,
	) => Effect.Effect<Readonly<Record<string, unknown>>, CollaboratorError>;
}

export class ScrapingService extends Context.Tag("ScrapingService")<
	ScrapingService,
	ScrapingServiceShape
>() {}

/**
 * Every collaborator a migration context exposes.
 */
export type Collaborators =
	| PublicationService
	| SearchService
	| EntityDatabase
	| ScrapingService;
