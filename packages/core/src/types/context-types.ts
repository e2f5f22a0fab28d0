import type { Effect } from "effect";
import type {
	EntityDatabaseShape,
	PublicationServiceShape,
	ScrapingServiceShape,
	SearchServiceShape,
} from "../services/collaborators.js";

/**
 * Promise-returning view of an Effect service, handed to migration bodies.
 * Failures reject with the service's tagged error.
 */
export type PromiseClient<Shape> = {
	readonly [K in keyof Shape]: Shape[K] extends (
		...args: infer Args
	) => Effect.Effect<infer A, infer _E, infer _R>
		? (...args: Args) => Promise<A>
		: never;
};

export interface ReadCsvOptions {
	/** Field separator, defaults to `,` */
	readonly delimiter?: string;
}

/**
 * The capability bundle passed to a migration's entry point. One context
 * belongs to exactly one run.
 */
export interface MigrationContext {
	readonly publication: PromiseClient<PublicationServiceShape>;
	readonly search: PromiseClient<SearchServiceShape>;
	readonly scraping: PromiseClient<ScrapingServiceShape>;
	readonly db: PromiseClient<EntityDatabaseShape>;
	/** Folder of the running migration; file helpers resolve against it. */
	readonly migrationDir: string;
	/** Lines appended with `log`, in order. */
	readonly logs: ReadonlyArray<string>;
	readonly log: (message: string) => void;
	readonly readText: (relativePath: string) => Promise<string>;
	readonly readJson: (relativePath: string) => Promise<unknown>;
	readonly readCsv: (
		relativePath: string,
		options?: ReadCsvOptions,
	) => Promise<ReadonlyArray<Record<string, string>>>;
}
