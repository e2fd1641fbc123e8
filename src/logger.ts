/**
 * Logger
 *
 * Console-backed progress reporting and logging. Library components take an
 * optional Logger and default to `silentLogger`.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  progress: (msg: string, current: number, total: number) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      if (!quiet) console.warn(`  ! ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    },
    progress: (msg: string, current: number, total: number) => {
      if (!quiet) {
        const pct = total > 0 ? Math.round((current / total) * 100) : 100
        const filled = Math.round(pct / 2.5)
        const bar = '█'.repeat(filled) + '░'.repeat(40 - filled)
        process.stdout.write(`\r  [${bar}] ${pct}% ${msg}`)
        if (current >= total) {
          process.stdout.write('\n')
        }
      }
    }
  }
}

const noop = (): void => {}

export const silentLogger: Logger = {
  log: noop,
  verbose: noop,
  success: noop,
  warn: noop,
  error: noop,
  progress: noop
}
