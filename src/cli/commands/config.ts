/**
 * Config Command
 *
 * `list` shows the settings stored in the config file next to the settings a
 * research run would actually use, after environment variables and defaults.
 * `set` and `unset` edit the file.
 */

import type { Environment } from '../../credentials'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  type ResearchConfig,
  resolveResearchConfig,
  setConfigValue,
  unsetConfigValue
} from '../config'

const LABEL_WIDTH = 20

/** Settings an environment variable takes precedence over */
const ENV_OVERRIDES: Partial<Record<ConfigKey, string>> = {
  cacheDir: 'RESEARCH_RELAY_CACHE_DIR'
}

function seconds(ms: number): string {
  return `${ms / 1000}s`
}

function hours(ms: number): string {
  return `${ms / 3_600_000}h`
}

/**
 * One line per resolved setting, in the order a run uses them.
 */
export function describeResearchConfig(config: ResearchConfig): string[] {
  const { circuitPolicy: circuit, defaults } = config
  const rateLimits = Object.entries(config.rateLimits).map(([kind, limit]) => {
    const perMinute = limit.windows.find((w) => w.windowMs === 60_000)
    return perMinute ? `${kind} ${perMinute.maxRequests}/min` : kind
  })
  const rows: Array<[string, string]> = [
    ['cache directory', config.cacheDir],
    [
      'embeddings',
      config.similarityThreshold === undefined
        ? config.embeddingProvider
        : `${config.embeddingProvider}, threshold ${config.similarityThreshold}`
    ],
    ['search cache TTL', hours(config.cacheTtlMs)],
    ['topic cache TTL', hours(config.topicTtlMs)],
    [
      'circuit breaker',
      `opens after ${circuit.failureThreshold} failures for ` +
        `${seconds(circuit.baseOpenMs)} to ${seconds(circuit.maxOpenMs)}`
    ],
    [
      'timeouts',
      `generation ${seconds(config.generationTimeoutMs)}, search ${seconds(config.searchTimeoutMs)}`
    ],
    [
      'concurrency',
      `${config.maxConcurrentRuns} runs, ${config.searchConcurrency} searches per run`
    ],
    [
      'research defaults',
      `${defaults.depth} depth, ${defaults.maxResults} results, ${defaults.maxQueries} queries`
    ],
    ['rate limits', rateLimits.length > 0 ? rateLimits.join(', ') : 'built-in']
  ]
  return rows.map(([label, value]) => `  ${label.padEnd(LABEL_WIDTH)}${value}`)
}

/**
 * Execute the config command.
 */
export async function cmdConfig(
  args: CLIArgs,
  logger: Logger,
  env: Environment = process.env
): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(args, logger, env)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger, env)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(
  args: Pick<CLIArgs, 'cacheDir' | 'configFile'>,
  logger: Logger,
  env: Environment
): Promise<void> {
  const config = await loadConfig(args.configFile)
  logger.log(`\nConfig file: ${getConfigPath(args.configFile, env)}\n`)

  const stored = getValidConfigKeys().filter((key) => config?.[key] !== undefined)
  if (stored.length === 0) {
    logger.log('  (no stored settings)')
  }
  for (const key of stored) {
    logger.log(`  ${key}: ${formatConfigValue(config?.[key])}`)
  }

  logger.log('\nIn effect:\n')
  const resolved = resolveResearchConfig(config, { cacheDir: args.cacheDir, env })
  for (const line of describeResearchConfig(resolved)) {
    logger.log(line)
  }
}

function requireKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger,
  env: Environment
): Promise<void> {
  const usage = 'research-relay config set <key> <value>'
  const validKey = requireKey(key, usage)
  if (value === undefined) {
    throw new Error(`Missing value. Usage: ${usage}`)
  }
  const parsed = parseConfigValue(validKey, value)
  await setConfigValue(validKey, parsed, configFile)
  logger.success(`Set ${validKey}=${formatConfigValue(parsed)}`)

  const envVar = ENV_OVERRIDES[validKey]
  if (envVar && env[envVar]) {
    logger.warn(`${envVar} is set and takes precedence over ${validKey}`)
  }
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = requireKey(key, 'research-relay config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.success(`Unset ${validKey}, using the default`)
}
