/**
 * @civic-ledger/cli - programmatic access to the CLI commands
 */

export { getOutputFormat, parseArgs } from "./args.js"
export type { ParsedArgs, ParsedFlags } from "./args.js"
export { detectSubcommand, handleMigrate, runMigrateCommand } from "./commands/migrate.js"
export type {
  MigrateDependencies,
  MigrateOptions,
  MigrateResult,
  MigrateSubcommand,
} from "./commands/migrate.js"
export { CONFIG_FILE_NAMES, ConfigNotFoundError, discoverConfig } from "./config/discovery.js"
export {
  ConfigFileSchema,
  ConfigLoadError,
  ConfigValidationError,
  loadConfig,
  STORAGE_ROOT_ENV,
} from "./config/loader.js"
export type { CliConfig, ConfigFile } from "./config/loader.js"
export { format } from "./output/formatter.js"
export type { OutputFormat, OutputRecord } from "./output/formatter.js"
export { confirm, parseAnswer } from "./prompt.js"
export type { Confirm, ConfirmOptions, ConfirmResult } from "./prompt.js"
