/**
 * Prompts for each generation step, and parsing of their responses.
 */

import type { ChatMessage } from '../generation'
import type { SearchResponse } from '../search'
import type { ResearchSource } from './types'

/** Source material handed to the analysis step is cut to this length */
export const SOURCE_MATERIAL_CHARS = 8000
/** Each search result contributes at most this much content */
export const RESULT_CONTENT_CHARS = 500
/** Analysis text quoted in the report and summary prompts */
export const ANALYSIS_EXCERPT_CHARS = 6000

const LIST_MARKER = /^(?:\d+\s*[.)]|[-*•])\s*/

export function queryPlanMessages(topic: string, maxQueries: number): ChatMessage[] {
  return [
    {
      role: 'system',
      content: 'You are a research assistant specialized in creating effective search queries.'
    },
    {
      role: 'user',
      content: `Research topic: ${topic}

Write ${maxQueries} specific search queries that together cover the different aspects of this topic.
Use effective search terms and avoid vague ones.

Return only the queries, one per line, without numbering or formatting.`
    }
  ]
}

/**
 * Search queries from a planning response: one per line, list markers and
 * quotes stripped, duplicates dropped. Falls back to the topic itself when
 * the response holds no usable line.
 */
export function parseQueries(response: string, topic: string, maxQueries: number): string[] {
  const queries: string[] = []
  const seen = new Set<string>()
  for (const line of response.split('\n')) {
    const query = line
      .trim()
      .replace(LIST_MARKER, '')
      .replace(/^["']|["']$/g, '')
      .trim()
    const key = query.toLowerCase()
    if (!query || seen.has(key)) continue
    seen.add(key)
    queries.push(query)
  }
  return queries.length > 0 ? queries.slice(0, maxQueries) : [topic.trim()]
}

export function formatSourceMaterial(responses: readonly SearchResponse[]): string {
  const sections = responses.map((response, i) => {
    const lines = [`=== Search query: ${response.query} ===`]
    if (response.answer) lines.push(`Answer: ${response.answer}`, '')
    response.results.forEach((result, j) => {
      lines.push(
        `Source ${i + 1}.${j + 1}: ${result.title}`,
        `URL: ${result.url}`,
        `Content: ${result.content.slice(0, RESULT_CONTENT_CHARS)}`,
        `Relevance: ${result.score}`,
        ''
      )
    })
    return lines.join('\n')
  })
  return sections.join('\n\n').slice(0, SOURCE_MATERIAL_CHARS)
}

export function analysisMessages(
  topic: string,
  responses: readonly SearchResponse[]
): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You are an expert research analyst. Synthesize information from multiple sources into a comprehensive analysis.'
    },
    {
      role: 'user',
      content: `Research topic: ${topic}

Analyze the search results below and provide:
1. Key findings with supporting evidence
2. A detailed analysis organized by theme
3. Gaps or contradictions in the information

Source material:
${formatSourceMaterial(responses)}`
    }
  ]
}

/** Unique sources across all responses, highest score first. */
export function collectSources(responses: readonly SearchResponse[]): ResearchSource[] {
  const byUrl = new Map<string, ResearchSource>()
  for (const response of responses) {
    for (const { title, url, score } of response.results) {
      if (!byUrl.has(url)) byUrl.set(url, { title, url, score })
    }
  }
  return [...byUrl.values()].sort((a, b) => b.score - a.score)
}

export function reportMessages(
  topic: string,
  analysis: string,
  sources: readonly ResearchSource[]
): ChatMessage[] {
  const sourceList = sources.map((s, i) => `[${i + 1}] ${s.title} (${s.url})`).join('\n')
  return [
    {
      role: 'system',
      content:
        'You are a research writer. Turn research analysis into a clear, well-structured markdown report.'
    },
    {
      role: 'user',
      content: `Write a research report on: ${topic}

Include an executive summary, the key findings, a detailed discussion and a conclusion.
Cite sources by their number in square brackets.

Analysis:
${analysis.slice(0, ANALYSIS_EXCERPT_CHARS)}

Sources:
${sourceList}`
    }
  ]
}

export function summaryMessages(report: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You are a research writer. Distill complex analysis into clear, accessible overviews.'
    },
    {
      role: 'user',
      content: `Write a concise executive summary (2-3 paragraphs) of the report below for a general audience.
Return only the summary, without headings.

Report:
${report.slice(0, ANALYSIS_EXCERPT_CHARS)}`
    }
  ]
}

export function languageName(code: string): string {
  try {
    return new Intl.DisplayNames(['en'], { type: 'language' }).of(code) ?? code
  } catch {
    return code
  }
}

export function translationMessages(text: string, targetLanguage: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `You are a professional translator. Translate the user's text into ${languageName(targetLanguage)}. Keep markdown formatting, links and numbers unchanged. Return only the translation.`
    },
    { role: 'user', content: text }
  ]
}
