/**
 * civic-ledger CLI - Argument Parsing
 */

import type { OutputFormat } from "./output/formatter.js"

export interface ParsedFlags {
  readonly help: boolean
  readonly version: boolean
  readonly config: string | undefined
  readonly json: boolean
  readonly yaml: boolean
  readonly verbose: boolean
  readonly dryRun: boolean
  readonly force: boolean
  readonly continueOnFailure: boolean
  readonly noCommit: boolean
  readonly yes: boolean
}

export interface ParsedArgs {
  readonly command: string | undefined
  readonly positionalArgs: readonly string[]
  readonly flags: ParsedFlags
  /** Flags that were not recognised, in order of appearance */
  readonly unknownFlags: readonly string[]
}

type BooleanFlag = Exclude<keyof ParsedFlags, "config">

const BOOLEAN_FLAGS: Readonly<Record<string, BooleanFlag>> = {
  "--help": "help",
  "-h": "help",
  "--version": "version",
  "-v": "version",
  "--json": "json",
  "--yaml": "yaml",
  "--verbose": "verbose",
  "--dry-run": "dryRun",
  "--force": "force",
  "-f": "force",
  "--continue-on-failure": "continueOnFailure",
  "--no-commit": "noCommit",
  "--yes": "yes",
  "-y": "yes",
}

export function getOutputFormat(flags: ParsedFlags): OutputFormat {
  if (flags.json) return "json"
  if (flags.yaml) return "yaml"
  return "table"
}

/**
 * Parse `process.argv`-shaped input (runtime and script path first).
 * The first positional is the command; `--` ends flag parsing.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = argv.slice(2)
  const flags: { -readonly [K in keyof ParsedFlags]: ParsedFlags[K] } = {
    help: false,
    version: false,
    config: undefined,
    json: false,
    yaml: false,
    verbose: false,
    dryRun: false,
    force: false,
    continueOnFailure: false,
    noCommit: false,
    yes: false,
  }
  const positionals: string[] = []
  const unknownFlags: string[] = []

  let i = 0
  let flagsEnded = false
  while (i < args.length) {
    const arg = args[i] ?? ""
    i++
    if (flagsEnded || !arg.startsWith("-")) {
      positionals.push(arg)
      continue
    }
    if (arg === "--") {
      flagsEnded = true
      continue
    }
    if (arg === "--config" || arg === "-c") {
      flags.config = args[i]
      i++
      continue
    }
    if (arg.startsWith("--config=")) {
      flags.config = arg.slice("--config=".length)
      continue
    }
    const flag = BOOLEAN_FLAGS[arg]
    if (flag === undefined) {
      unknownFlags.push(arg)
    } else {
      flags[flag] = true
    }
  }

  const [command, ...positionalArgs] = positionals
  return { command, positionalArgs, flags, unknownFlags }
}
