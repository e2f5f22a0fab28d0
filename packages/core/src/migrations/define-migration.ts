import type { MigrationDefinition } from "../types/migration-types.js";

/**
 * Declare a migration. Entry scripts default-export the result:
 *
 * ```ts
 * export default defineMigration({
 *   author: "data-team@example.org",
 *   date: "2024-01-15",
 *   description: "Import provincial capitals",
 *   migrate: async (context) => {
 *     context.log("Importing capitals")
 *   },
 * })
 * ```
 *
 * The literal is read statically during discovery, so `author`, `date` and
 * `description` should be plain string literals or top-level string consts.
 */
export const defineMigration = (
	definition: MigrationDefinition,
): MigrationDefinition => definition;
