/**
 * Credentials
 *
 * Per-run API keys: keys supplied by the caller override the server's
 * environment keys, provider by provider. Candidate lists for the fallback
 * chain are built from whatever keys resolve.
 */

import { createHash } from 'node:crypto'
import {
  AnthropicBackend,
  type GenerationBackend,
  type GenerationProviderKind,
  OpenAICompatibleBackend
} from '../generation'
import type { ProviderCandidate } from '../providers/dispatch'
import { BraveSearchBackend, type SearchBackend, TavilySearchBackend } from '../search'

export type SearchProviderKind = 'tavily' | 'brave'
export type CredentialProvider = GenerationProviderKind | SearchProviderKind
export type KeySource = 'user' | 'server'

export interface ResolvedKey {
  readonly provider: CredentialProvider
  readonly apiKey: string
  readonly source: KeySource
}

export type UserKeys = Partial<Record<CredentialProvider, string | undefined>>
export type ResolvedCredentials = Partial<Record<CredentialProvider, ResolvedKey>>
export type Environment = Readonly<Record<string, string | undefined>>

/** Fallback order for generation. */
export const GENERATION_PROVIDERS: readonly GenerationProviderKind[] = [
  'openai',
  'deepseek',
  'anthropic'
]

/** Fallback order for search. */
export const SEARCH_PROVIDERS: readonly SearchProviderKind[] = ['tavily', 'brave']

export const ENV_KEYS: Record<CredentialProvider, string> = {
  openai: 'OPENAI_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  tavily: 'TAVILY_API_KEY',
  brave: 'BRAVE_SEARCH_API_KEY'
}

const ALL_PROVIDERS: readonly CredentialProvider[] = [...GENERATION_PROVIDERS, ...SEARCH_PROVIDERS]

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function resolveCredentials(
  userKeys: UserKeys = {},
  env: Environment = process.env
): ResolvedCredentials {
  const resolved: ResolvedCredentials = {}
  for (const provider of ALL_PROVIDERS) {
    const userKey = present(userKeys[provider])
    const serverKey = present(env[ENV_KEYS[provider]])
    if (userKey) {
      resolved[provider] = { provider, apiKey: userKey, source: 'user' }
    } else if (serverKey) {
      resolved[provider] = { provider, apiKey: serverKey, source: 'server' }
    }
  }
  return resolved
}

export function keySourceLabel(
  provider: CredentialProvider,
  credentials: ResolvedCredentials
): string {
  const key = credentials[provider]
  if (!key) return 'Not configured'
  return key.source === 'user' ? 'Your key' : 'Server key'
}

/**
 * Health and rate-limit records are kept per key: a caller's own key gets
 * its own id, so a broken user key never opens the circuit for the
 * server's key.
 */
export function candidateId(key: ResolvedKey): string {
  if (key.source === 'server') return key.provider
  const digest = createHash('sha256').update(key.apiKey).digest('hex').slice(0, 8)
  return `${key.provider}:user:${digest}`
}

export interface CandidateOptions {
  readonly models?: Partial<Record<GenerationProviderKind, string>> | undefined
  readonly timeoutMs?: number | undefined
}

function createGenerationBackend(
  key: ResolvedKey & { provider: GenerationProviderKind },
  options: CandidateOptions
): GenerationBackend {
  const model = options.models?.[key.provider]
  if (key.provider === 'anthropic') {
    return new AnthropicBackend({ apiKey: key.apiKey, model, timeoutMs: options.timeoutMs })
  }
  return new OpenAICompatibleBackend({
    kind: key.provider,
    apiKey: key.apiKey,
    model,
    timeoutMs: options.timeoutMs
  })
}

export function buildGenerationCandidates(
  credentials: ResolvedCredentials,
  options: CandidateOptions = {}
): ProviderCandidate<GenerationBackend>[] {
  const candidates: ProviderCandidate<GenerationBackend>[] = []
  GENERATION_PROVIDERS.forEach((provider, priority) => {
    const key = credentials[provider]
    if (!key) return
    candidates.push({
      id: candidateId(key),
      kind: provider,
      priority,
      client: createGenerationBackend({ ...key, provider }, options)
    })
  })
  return candidates
}

export function buildSearchCandidates(
  credentials: ResolvedCredentials,
  options: Pick<CandidateOptions, 'timeoutMs'> = {}
): ProviderCandidate<SearchBackend>[] {
  const candidates: ProviderCandidate<SearchBackend>[] = []
  SEARCH_PROVIDERS.forEach((provider, priority) => {
    const key = credentials[provider]
    if (!key) return
    const config = { apiKey: key.apiKey, timeoutMs: options.timeoutMs }
    candidates.push({
      id: candidateId(key),
      kind: provider,
      priority,
      client:
        provider === 'tavily' ? new TavilySearchBackend(config) : new BraveSearchBackend(config)
    })
  })
  return candidates
}
