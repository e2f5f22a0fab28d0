#!/usr/bin/env tsx
/**
 * civic-ledger CLI - runs and inspects knowledge-base migrations
 *
 * Entry point: parses top-level flags and dispatches to command handlers.
 */

import { Effect, Logger, LogLevel } from "effect"
import { parseArgs, getOutputFormat, type ParsedArgs } from "./args.js"
import { discoverConfig } from "./config/discovery.js"
import { loadConfig, type CliConfig } from "./config/loader.js"
import { detectSubcommand, runMigrateCommand } from "./commands/migrate.js"

const VERSION = "0.1.0"

function printHelp(): void {
  console.log(`civic-ledger v${VERSION}

Runs and inspects knowledge-base migrations.

USAGE:
  civic-ledger migrate <subcommand> [options]

SUBCOMMANDS:
  migrate list              List migrations with their applied/pending state
  migrate pending           List migrations not applied yet
  migrate show <name>       Show a migration and its ledger entry
  migrate run [names...]    Run the named migrations, or every pending one

GLOBAL OPTIONS:
  -h, --help                Show this help message
  -v, --version             Show version
  -c, --config <path>       Path to config file (default: auto-discover)
  --json                    Output as JSON
  --yaml                    Output as YAML
  --verbose                 Print debug logs

RUN OPTIONS:
  --dry-run                 Run migration bodies without recording them
  -f, --force               Re-run named migrations that are already applied
  --continue-on-failure     Keep going after a failed migration
  --no-commit               Do not record ledger entries
                            (with git tracking, --dry-run and --no-commit
                            leave changes uncommitted: run one migration
                            at a time)
  -y, --yes                 Skip the confirmation prompt

ENVIRONMENT:
  CIVIC_LEDGER_STORAGE_ROOT Overrides storageRoot from the config file

EXAMPLES:
  civic-ledger migrate list
  civic-ledger migrate run --dry-run
  civic-ledger migrate run 004-hospital-contacts --force --yes
  civic-ledger migrate show 000-initial-locations --json
`)
}

function exitWithError(message: string): never {
  console.error(`Error: ${message}`)
  console.error(`Run 'civic-ledger --help' for usage.`)
  process.exit(1)
}

const logLevelFor = (args: ParsedArgs) =>
  args.flags.verbose ? LogLevel.Debug : LogLevel.Warning

/**
 * Discover and load the config, exiting on any config error.
 */
async function resolveConfig(args: ParsedArgs): Promise<CliConfig> {
  const program = Effect.gen(function* () {
    const configPath = yield* discoverConfig(process.cwd(), args.flags.config)
    return yield* loadConfig(configPath)
  })

  const result = await Effect.runPromise(
    program.pipe(Effect.either, Logger.withMinimumLogLevel(logLevelFor(args))),
  )
  if (result._tag === "Left") {
    exitWithError(result.left.message)
  }
  return result.right
}

async function handleMigrate(args: ParsedArgs): Promise<number> {
  const { subcommand, names } = detectSubcommand(args.positionalArgs)
  if (subcommand === undefined) {
    exitWithError(`Unknown migrate subcommand: ${args.positionalArgs[0] ?? ""}`)
  }
  const config = await resolveConfig(args)

  const result = await Effect.runPromise(
    runMigrateCommand({
      config,
      subcommand,
      names,
      format: getOutputFormat(args.flags),
      dryRun: args.flags.dryRun,
      force: args.flags.force,
      continueOnFailure: args.flags.continueOnFailure,
      noCommit: args.flags.noCommit,
      yes: args.flags.yes,
    }).pipe(Logger.withMinimumLogLevel(logLevelFor(args))),
  )

  for (const warning of result.warnings) {
    console.error(`Warning: ${warning}`)
  }
  if (result.output.length > 0) {
    console.log(result.output)
  }
  if (result.message !== undefined) {
    console.error(`Error: ${result.message}`)
  }
  return result.exitCode
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv)

  if (args.flags.version) {
    console.log(`civic-ledger v${VERSION}`)
    return 0
  }
  if (args.flags.help || args.command === undefined) {
    printHelp()
    return 0
  }
  if (args.unknownFlags.length > 0) {
    exitWithError(`Unknown option: ${args.unknownFlags.join(", ")}`)
  }

  switch (args.command) {
    case "migrate":
      return handleMigrate(args)
    default:
      exitWithError(`Unknown command: ${args.command}`)
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    console.error("Fatal error:", error)
    process.exit(1)
  },
)
