/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import type { SearchDepth } from '../search'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CacheAction = 'stats' | 'purge' | 'clear'
export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  topic: string
  /** Target language code for the research output */
  language: string | undefined
  /** Unset options fall back to the config file, then built-in defaults */
  depth: SearchDepth | undefined
  maxResults: number | undefined
  maxQueries: number | undefined
  forceFresh: boolean
  /** Print the report as it is generated */
  stream: boolean
  json: boolean
  quiet: boolean
  verbose: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  /** For cache command: stats (default), purge, clear */
  cacheAction: CacheAction
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Research a topic on the web with an LLM, through a resilient and cached provider layer.

Searches go through Tavily or Brave Search; generation through OpenAI, DeepSeek or Anthropic,
in that order, with automatic fallback. Set keys with OPENAI_API_KEY, DEEPSEEK_API_KEY,
ANTHROPIC_API_KEY, TAVILY_API_KEY and BRAVE_SEARCH_API_KEY.

Examples:
  $ research-relay research "tidal power in Europe"
  $ research-relay research "tidal power in Europe" --language fr --stream
  $ research-relay cache stats`

function createProgram(): Command {
  const program = new Command()
    .name('research-relay')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Custom cache directory (or set RESEARCH_RELAY_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set RESEARCH_RELAY_CONFIG)')

  // ============ RESEARCH ============
  program
    .command('research')
    .description('Research a topic: plan queries, search, analyze, write a report and summary')
    .argument('<topic>', 'Topic to research')
    .option('-l, --language <code>', 'Output language code, e.g. en, fr, de (default: en)')
    .option('-d, --depth <depth>', 'Search depth: basic or advanced')
    .option('-n, --max-results <num>', 'Results per search query')
    .option('--max-queries <num>', 'Search queries to plan')
    .option('-f, --force-fresh', 'Ignore recent results for this topic and research again')
    .option('-s, --stream', 'Print the report while it is written')
    .option('--json', 'Print the finished run as JSON')

  // ============ CACHE ============
  program
    .command('cache')
    .description('Inspect or clean the search and topic caches')
    .argument('[action]', 'Action: stats (default), purge, clear')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  research-relay config                                List current settings
  research-relay config set embeddingProvider hash     Use local hash embeddings
  research-relay config set openaiRequestsPerMinute 10 Lower the OpenAI rate limit
  research-relay config unset cacheDir                 Remove custom cache dir`
    )

  return program
}

function parseDepth(value: unknown): SearchDepth | undefined {
  if (value === 'basic' || value === 'advanced') {
    return value
  }
  return undefined
}

function parsePositiveInt(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) || parsed < 1 ? undefined : parsed
}

function parseCacheAction(action: string | undefined): CacheAction {
  if (action === 'purge' || action === 'clear') {
    return action
  }
  return 'stats'
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function buildCLIArgs(commandName: string, topic: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    topic,
    language: typeof opts.language === 'string' ? opts.language : undefined,
    depth: parseDepth(opts.depth),
    maxResults: parsePositiveInt(opts.maxResults),
    maxQueries: parsePositiveInt(opts.maxQueries),
    forceFresh: opts.forceFresh === true,
    stream: opts.stream === true,
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    cacheDir: typeof opts.cacheDir === 'string' ? opts.cacheDir : undefined,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    cacheAction: 'stats',
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

/**
 * Build the program with action handlers that hand the parsed args to `capture`.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function createCapturingProgram(capture: (args: CLIArgs) => void): Command {
  const program = createProgram()

  for (const cmd of program.commands) {
    switch (cmd.name()) {
      case 'research':
        cmd.action((topic: string) => {
          capture(buildCLIArgs('research', topic, cmd.optsWithGlobals()))
        })
        break
      case 'cache':
        cmd.action((action?: string) => {
          capture({
            ...buildCLIArgs('cache', '', cmd.optsWithGlobals()),
            cacheAction: parseCacheAction(action)
          })
        })
        break
      case 'config':
        cmd.action((action?: string, key?: string, value?: string) => {
          capture({
            ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
            configAction: parseConfigAction(action),
            configKey: key,
            configValue: value
          })
        })
        break
    }
  }

  return program
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  let result: CLIArgs | null = null
  const program = createCapturingProgram((args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  let result: CLIArgs | null = null
  const program = createCapturingProgram((args) => {
    result = args
  })

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version
    if (!result) {
      return buildCLIArgs('help', '', {})
    }
  }

  return result ?? buildCLIArgs('help', '', {})
}
