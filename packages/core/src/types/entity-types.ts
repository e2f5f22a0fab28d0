// ============================================================================
// Knowledge Base Records
// ============================================================================

/**
 * Entity kinds stored in the knowledge base. Subtypes (political party,
 * hospital, district …) are free-form strings owned by the data model.
 */
export type EntityType = "person" | "organization" | "location"

/**
 * A persisted entity as returned by the database and publication
 * collaborators. `data` is the model-specific payload (names, identifiers,
 * contacts …) and is opaque to the migration subsystem.
 */
export interface Entity {
	readonly id: string
	readonly type: EntityType
	readonly subType: string | null
	readonly data: Readonly<Record<string, unknown>>
	readonly versionNumber: number
}

/**
 * A directed, typed edge between two entities.
 */
export interface Relationship {
	readonly id: string
	readonly sourceId: string
	readonly targetId: string
	readonly type: string
	readonly versionNumber: number
}

/**
 * The author a change is attributed to.
 */
export interface Author {
	readonly id: string
	readonly name: string
}
