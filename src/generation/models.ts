/**
 * Default models and endpoints per generation provider.
 */

import type { GenerationProviderKind } from './types'

export const DEFAULT_MODELS: Record<GenerationProviderKind, string> = {
  openai: 'gpt-4o-mini',
  deepseek: 'deepseek-chat',
  anthropic: 'claude-haiku-4-5'
}

export const CHAT_COMPLETIONS_URLS: Record<Exclude<GenerationProviderKind, 'anthropic'>, string> = {
  openai: 'https://api.openai.com/v1/chat/completions',
  deepseek: 'https://api.deepseek.com/chat/completions'
}

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages'
export const ANTHROPIC_VERSION = '2023-06-01'
