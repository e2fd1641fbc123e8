/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/research-relay/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or RESEARCH_RELAY_CONFIG env var.
 *
 * `resolveResearchConfig` merges the file with defaults and environment
 * variables into the settings the research service is built from.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { DEFAULT_CACHE_TTL_MS } from '../caching'
import type { Environment } from '../credentials'
import type { EmbeddingProviderChoice } from '../embeddings'
import { DEFAULT_GENERATION_TIMEOUT_MS, type GenerationProviderKind } from '../generation'
import { DEFAULT_SEARCH_CONCURRENCY } from '../pipeline/research-service'
import { DEFAULT_MAX_CONCURRENT_RUNS } from '../pipeline/run-queue'
import { DEFAULT_RESEARCH_PARAMETERS, type ResearchParameters } from '../pipeline/types'
import { DEFAULT_RATE_LIMITS, type RateLimit } from '../providers/rate-limiter'
import { type CircuitPolicy, DEFAULT_CIRCUIT_POLICY } from '../providers/registry'
import { DEFAULT_SEARCH_TIMEOUT_MS, type SearchDepth } from '../search'
import { isRecord, readOptional, USER_CACHE_DIR } from '../shared/fs'
import { DEFAULT_TOPIC_TTL_MS } from '../topic-cache'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Custom cache directory */
  cacheDir?: string | undefined
  /** Embedding provider for the semantic cache tier: auto, hash or openai */
  embeddingProvider?: string | undefined
  /** Search depth used when --depth is not given */
  depth?: string | undefined
  openaiModel?: string | undefined
  deepseekModel?: string | undefined
  anthropicModel?: string | undefined

  // === Caching ===
  /** Lifetime of cached search responses, in hours */
  cacheTtlHours?: number | undefined
  /** Lifetime of completed topic results, in hours */
  topicTtlHours?: number | undefined
  /** Minimum cosine similarity for a semantic cache hit */
  similarityThreshold?: number | undefined

  // === Rate limits (requests per minute) ===
  openaiRequestsPerMinute?: number | undefined
  deepseekRequestsPerMinute?: number | undefined
  anthropicRequestsPerMinute?: number | undefined
  tavilyRequestsPerMinute?: number | undefined
  braveRequestsPerMinute?: number | undefined

  // === Circuit breaker ===
  circuitFailureThreshold?: number | undefined
  circuitOpenSeconds?: number | undefined
  circuitMaxOpenSeconds?: number | undefined

  // === Timeouts and sizes ===
  generationTimeoutSeconds?: number | undefined
  searchTimeoutSeconds?: number | undefined
  maxConcurrentRuns?: number | undefined
  searchConcurrency?: number | undefined
  maxResults?: number | undefined
  maxQueries?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

type StringConfigKey =
  | 'cacheDir'
  | 'embeddingProvider'
  | 'depth'
  | 'openaiModel'
  | 'deepseekModel'
  | 'anthropicModel'

type NumberConfigKey = Exclude<ConfigKey, StringConfigKey>

export type ConfigValue = string | number

/** Config keys that accept string values */
const STRING_KEYS: readonly StringConfigKey[] = [
  'cacheDir',
  'embeddingProvider',
  'depth',
  'openaiModel',
  'deepseekModel',
  'anthropicModel'
]
/** Config keys that accept number values */
const NUMBER_KEYS: readonly NumberConfigKey[] = [
  'cacheTtlHours',
  'topicTtlHours',
  'similarityThreshold',
  'openaiRequestsPerMinute',
  'deepseekRequestsPerMinute',
  'anthropicRequestsPerMinute',
  'tavilyRequestsPerMinute',
  'braveRequestsPerMinute',
  'circuitFailureThreshold',
  'circuitOpenSeconds',
  'circuitMaxOpenSeconds',
  'generationTimeoutSeconds',
  'searchTimeoutSeconds',
  'maxConcurrentRuns',
  'searchConcurrency',
  'maxResults',
  'maxQueries'
]

/** Allowed values for string keys that take a fixed set */
const CHOICES: Partial<Record<ConfigKey, readonly string[]>> = {
  embeddingProvider: ['auto', 'hash', 'openai'],
  depth: ['basic', 'advanced']
}

/** Keys whose values must be whole numbers */
const INTEGER_KEYS: readonly NumberConfigKey[] = [
  'openaiRequestsPerMinute',
  'deepseekRequestsPerMinute',
  'anthropicRequestsPerMinute',
  'tavilyRequestsPerMinute',
  'braveRequestsPerMinute',
  'circuitFailureThreshold',
  'maxConcurrentRuns',
  'searchConcurrency',
  'maxResults',
  'maxQueries'
]

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  cacheDir: 'Cache directory path (default: ~/.cache/research-relay)',
  embeddingProvider: 'Semantic cache embeddings: auto, hash, openai (default: auto)',
  depth: 'Default search depth: basic, advanced (default: basic)',
  openaiModel: 'OpenAI chat model (default: gpt-4o-mini)',
  deepseekModel: 'DeepSeek chat model (default: deepseek-chat)',
  anthropicModel: 'Anthropic model (default: claude-haiku-4-5)',

  cacheTtlHours: 'Search cache lifetime in hours (default: 24)',
  topicTtlHours: 'Topic result lifetime in hours (default: 24)',
  similarityThreshold: 'Semantic hit threshold 0-1 (default: set by the embedding provider)',

  openaiRequestsPerMinute: 'OpenAI requests per minute (default: 20)',
  deepseekRequestsPerMinute: 'DeepSeek requests per minute (default: 100)',
  anthropicRequestsPerMinute: 'Anthropic requests per minute (default: 50)',
  tavilyRequestsPerMinute: 'Tavily requests per minute (default: 60)',
  braveRequestsPerMinute: 'Brave Search requests per minute (default: 60)',

  circuitFailureThreshold: 'Consecutive failures that open a circuit (default: 3)',
  circuitOpenSeconds: 'First circuit open period in seconds (default: 30)',
  circuitMaxOpenSeconds: 'Longest circuit open period in seconds (default: 300)',

  generationTimeoutSeconds: 'Timeout per generation call in seconds (default: 120)',
  searchTimeoutSeconds: 'Timeout per search call in seconds (default: 20)',
  maxConcurrentRuns: 'Research runs doing pipeline work at once (default: 2)',
  searchConcurrency: 'Searches run at once within a run (default: 3)',
  maxResults: 'Default results per search query (default: 5)',
  maxQueries: 'Default number of planned search queries (default: 5)'
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (INTEGER_KEYS.some((k) => k === key)) return 'integer'
  if (NUMBER_KEYS.some((k) => k === key)) return 'number'
  const choices = CHOICES[key]
  return choices ? choices.join('|') : 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for research-relay.
 * Uses ~/.config/research-relay on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'research-relay')
}

/**
 * Get the config file path.
 * Priority: configFile arg > RESEARCH_RELAY_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string, env: Environment = process.env): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = env['RESEARCH_RELAY_CONFIG']
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep only known keys holding values of the right type.
 */
export function sanitizeConfig(raw: Readonly<Record<string, unknown>>): Config {
  const config: Config = {}
  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value
  }
  if (typeof raw['updatedAt'] === 'string') config.updatedAt = raw['updatedAt']
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const content = await readOptional(getConfigPath(configFile))
  if (content === null) {
    return null
  }
  try {
    const parsed: unknown = JSON.parse(content)
    return isRecord(parsed) ? sanitizeConfig(parsed) : null
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws Error when the value does not fit the key
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (NUMBER_KEYS.some((k) => k === key)) {
    const parsed = Number(value.trim())
    if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
      throw new Error(`Invalid value for ${key}: expected a non-negative number, got "${value}"`)
    }
    if (INTEGER_KEYS.some((k) => k === key) && !Number.isInteger(parsed)) {
      throw new Error(`Invalid value for ${key}: expected a whole number, got "${value}"`)
    }
    if (key === 'similarityThreshold' && parsed > 1) {
      throw new Error(`Invalid value for ${key}: expected a number from 0 to 1, got "${value}"`)
    }
    return parsed
  }
  const choices = CHOICES[key]
  if (choices && !choices.includes(value)) {
    throw new Error(`Invalid value for ${key}: expected one of ${choices.join(', ')}`)
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(sanitizeConfig({ ...config, [key]: value }), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

// ============================================================================
// Resolved settings
// ============================================================================

/** Everything the research runtime is built from. */
export interface ResearchConfig {
  readonly cacheDir: string
  readonly embeddingProvider: EmbeddingProviderChoice
  readonly cacheTtlMs: number
  readonly topicTtlMs: number
  readonly similarityThreshold?: number | undefined
  readonly rateLimits: Readonly<Record<string, RateLimit>>
  readonly circuitPolicy: CircuitPolicy
  readonly generationTimeoutMs: number
  readonly searchTimeoutMs: number
  readonly maxConcurrentRuns: number
  readonly searchConcurrency: number
  readonly defaults: ResearchParameters
  readonly models: Partial<Record<GenerationProviderKind, string>>
}

const HOUR_MS = 60 * 60 * 1000
const MINUTE_MS = 60 * 1000

const RATE_KEYS: Record<string, NumberConfigKey> = {
  openai: 'openaiRequestsPerMinute',
  deepseek: 'deepseekRequestsPerMinute',
  anthropic: 'anthropicRequestsPerMinute',
  tavily: 'tavilyRequestsPerMinute',
  brave: 'braveRequestsPerMinute'
}

/**
 * Cache directory.
 * Priority: --cache-dir > RESEARCH_RELAY_CACHE_DIR > config file > ~/.cache/research-relay
 */
export function getCacheDir(
  override: string | undefined,
  config: Config | null,
  env: Environment = process.env
): string {
  return override ?? env['RESEARCH_RELAY_CACHE_DIR'] ?? config?.cacheDir ?? USER_CACHE_DIR
}

function parseEmbeddingChoice(value: string | undefined): EmbeddingProviderChoice {
  return value === 'hash' || value === 'openai' ? value : 'auto'
}

function parseDepth(value: string | undefined): SearchDepth {
  return value === 'advanced' ? 'advanced' : 'basic'
}

/** Override the per-minute window of each configured provider, keeping its other windows. */
function resolveRateLimits(config: Config): Record<string, RateLimit> {
  const limits: Record<string, RateLimit> = {}
  for (const [kind, key] of Object.entries(RATE_KEYS)) {
    const perMinute = config[key]
    const base = DEFAULT_RATE_LIMITS[kind]
    if (perMinute === undefined || !base) continue
    const hasMinuteWindow = base.windows.some((w) => w.windowMs === MINUTE_MS)
    limits[kind] = {
      ...base,
      windows: hasMinuteWindow
        ? base.windows.map((w) =>
            w.windowMs === MINUTE_MS ? { ...w, maxRequests: perMinute } : w
          )
        : [...base.windows, { maxRequests: perMinute, windowMs: MINUTE_MS }]
    }
  }
  return limits
}

function secondsToMs(seconds: number | undefined, fallback: number): number {
  return seconds === undefined ? fallback : seconds * 1000
}

export function resolveResearchConfig(
  config: Config | null,
  options: { cacheDir?: string | undefined; env?: Environment | undefined } = {}
): ResearchConfig {
  const file = config ?? {}
  const models: Partial<Record<GenerationProviderKind, string>> = {
    ...(file.openaiModel && { openai: file.openaiModel }),
    ...(file.deepseekModel && { deepseek: file.deepseekModel }),
    ...(file.anthropicModel && { anthropic: file.anthropicModel })
  }

  return {
    cacheDir: getCacheDir(options.cacheDir, config, options.env),
    embeddingProvider: parseEmbeddingChoice(file.embeddingProvider),
    cacheTtlMs:
      file.cacheTtlHours === undefined ? DEFAULT_CACHE_TTL_MS : file.cacheTtlHours * HOUR_MS,
    topicTtlMs:
      file.topicTtlHours === undefined ? DEFAULT_TOPIC_TTL_MS : file.topicTtlHours * HOUR_MS,
    similarityThreshold: file.similarityThreshold,
    rateLimits: resolveRateLimits(file),
    circuitPolicy: {
      failureThreshold: file.circuitFailureThreshold ?? DEFAULT_CIRCUIT_POLICY.failureThreshold,
      baseOpenMs: secondsToMs(file.circuitOpenSeconds, DEFAULT_CIRCUIT_POLICY.baseOpenMs),
      maxOpenMs: secondsToMs(file.circuitMaxOpenSeconds, DEFAULT_CIRCUIT_POLICY.maxOpenMs)
    },
    generationTimeoutMs: secondsToMs(file.generationTimeoutSeconds, DEFAULT_GENERATION_TIMEOUT_MS),
    searchTimeoutMs: secondsToMs(file.searchTimeoutSeconds, DEFAULT_SEARCH_TIMEOUT_MS),
    maxConcurrentRuns: file.maxConcurrentRuns || DEFAULT_MAX_CONCURRENT_RUNS,
    searchConcurrency: file.searchConcurrency || DEFAULT_SEARCH_CONCURRENCY,
    defaults: {
      depth: parseDepth(file.depth),
      maxResults: file.maxResults || DEFAULT_RESEARCH_PARAMETERS.maxResults,
      maxQueries: file.maxQueries || DEFAULT_RESEARCH_PARAMETERS.maxQueries
    },
    models
  }
}
