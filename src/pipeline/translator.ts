import { type GenerationDependencies, generateText } from '../generation'
import type { Result } from '../types'
import { translationMessages } from './prompts'
import type { Translator } from './types'

const TRANSLATION_TEMPERATURE = 0.2

/** Translates by prompting the generation fallback chain. */
export class GenerationTranslator implements Translator {
  constructor(private readonly deps: GenerationDependencies) {}

  async translate(
    text: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<Result<string>> {
    if (!text.trim()) return { ok: true, value: text }

    const result = await generateText(
      { messages: translationMessages(text, targetLanguage), temperature: TRANSLATION_TEMPERATURE },
      { ...this.deps, ...(signal && { signal }) }
    )
    if (!result.ok) return result
    return { ok: true, value: result.value.text.trim() }
  }
}
