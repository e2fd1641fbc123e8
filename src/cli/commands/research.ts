/**
 * Research Command
 *
 * Runs the research pipeline for one topic, printing progress as it goes.
 * Ctrl+C cancels the run between steps.
 */

import { VERSION } from '../../index'
import type { Logger } from '../../logger'
import type { PipelineOutcome, ProgressEvent } from '../../pipeline/types'
import type { CLIArgs } from '../args'
import { createResearchRuntime, loadResearchConfig } from '../runtime'

const SOURCE_LABELS: Record<PipelineOutcome['source'], string> = {
  fresh: 'fresh research',
  topic_cache: 'recent result for this topic',
  translated: 'translated from a recent result'
}

/**
 * Prints each new step once, and with --stream the report text as it arrives.
 */
export function createProgressPrinter(
  logger: Logger,
  options: { stream: boolean; write?: ((text: string) => void) | undefined }
): { onProgress: (event: ProgressEvent) => void; streamed: () => boolean } {
  const write = options.write ?? ((text: string) => process.stdout.write(text))
  let lastMessage = ''
  /** Report text written since the stream began */
  let printed = ''
  let streamed = false

  return {
    onProgress: (event) => {
      if (event.partialText !== undefined) {
        if (!options.stream) return
        const text = event.partialText
        if (!text.startsWith(printed)) {
          write('\n')
          printed = ''
        }
        if (!printed) write('\n')
        write(text.slice(printed.length))
        printed = text
        streamed = true
        return
      }
      if (event.message === lastMessage) return
      if (printed) {
        write('\n\n')
        printed = ''
      }
      lastMessage = event.message
      logger.log(`  [${String(event.progress).padStart(3)}%] ${event.message}`)
    },
    streamed: () => streamed
  }
}

function printOutcome(outcome: PipelineOutcome, showReport: boolean, logger: Logger): void {
  const { run } = outcome
  logger.log('\n📋 Summary\n')
  logger.log(run.summary)
  if (showReport) {
    logger.log('\n📝 Report\n')
    logger.log(run.report)
  }
  if (run.sources.length > 0) {
    logger.log('\n🔗 Sources\n')
    run.sources.forEach((source, i) => {
      logger.log(`  ${i + 1}. ${source.title}\n     ${source.url}`)
    })
  }
  logger.log('')
  logger.success(
    `${SOURCE_LABELS[outcome.source]} (${(run.processingTimeMs / 1000).toFixed(1)}s` +
      `${run.provider ? `, ${run.provider}` : ''})`
  )
  logger.log(`  Run ${outcome.runId}, stored as ${outcome.reference}`)
}

export async function cmdResearch(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.topic.trim()) {
    throw new Error('No topic specified')
  }

  const config = await loadResearchConfig(args)
  const { service } = await createResearchRuntime(config, logger)

  if (!args.json) {
    logger.log(`\nresearch-relay v${VERSION}`)
    logger.log(`\n🔎 ${args.topic.trim()}${args.language ? ` (${args.language})` : ''}\n`)
  }

  const printer = createProgressPrinter(logger, { stream: args.stream && !args.json })
  const controller = new AbortController()
  const onInterrupt = (): void => {
    logger.warn('Cancelling...')
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    const started = service.startPipeline({
      topic: args.topic,
      language: args.language,
      forceFresh: args.forceFresh,
      parameters: {
        ...(args.depth && { depth: args.depth }),
        ...(args.maxResults !== undefined && { maxResults: args.maxResults }),
        ...(args.maxQueries !== undefined && { maxQueries: args.maxQueries })
      },
      ...(!args.json && { onProgress: printer.onProgress }),
      signal: controller.signal
    })
    const result = await started.done

    if (!result.ok) {
      const status = service.getStatus(started.runId)
      if (status?.state === 'cancelled') {
        logger.warn(status.message)
        process.exitCode = 130
        return
      }
      throw new Error(status?.message ?? result.error.message)
    }

    if (args.json) {
      console.log(JSON.stringify(result.value, null, 2))
      return
    }
    printOutcome(result.value, !printer.streamed(), logger)
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }
}
