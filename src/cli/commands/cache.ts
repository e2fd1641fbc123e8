/**
 * Cache Command
 *
 * Statistics and cleanup for the search cache and the topic cache.
 */

import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { createCacheRuntime, loadResearchConfig } from '../runtime'

export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadResearchConfig(args)
  const { searchCache, topicStore } = createCacheRuntime(config, logger)

  switch (args.cacheAction) {
    case 'stats': {
      const stats = await searchCache.getStats()
      logger.log(`\nCache directory: ${config.cacheDir}\n`)
      logger.log(`  Search cache entries: ${stats.entries.toLocaleString()}`)
      logger.log(`  Hits served:          ${stats.storedHits.toLocaleString()}`)
      break
    }
    case 'purge': {
      const removed = await searchCache.purgeExpired()
      const noun = removed === 1 ? 'entry' : 'entries'
      logger.success(`Purged ${removed} expired search cache ${noun}`)
      break
    }
    case 'clear':
      await searchCache.clear()
      await topicStore.clear()
      logger.success('Cleared the search cache and topic results')
      break
  }
}
