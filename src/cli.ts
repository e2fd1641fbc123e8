#!/usr/bin/env node
/**
 * research-relay CLI
 *
 * Runs research on a topic through the cached, rate-limited provider layer,
 * and manages its caches and settings.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdCache } from './cli/commands/cache'
import { cmdConfig } from './cli/commands/config'
import { cmdResearch } from './cli/commands/research'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'research':
        await cmdResearch(args, logger)
        break

      case 'cache':
        await cmdCache(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'research-relay --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
