/**
 * Progress reporting
 *
 * Reporters are advisory: the coordinator calls them after every task and
 * ignores them once they fail.
 */

import type { Logger } from '../core/logger.js'
import { toError } from '../core/errors.js'

export interface ProgressReporter {
  /** Called after every task resolution, possibly out of order */
  report(completed: number, total: number): void
}

export interface ConsoleProgressOptions {
  label?: string
  /** Print every N completions (default: 1% of total, at least 1) */
  every?: number
  write?: (line: string) => void
}

/**
 * Prints `label: completed/total (pct%)` lines
 *
 * Keeps the highest completion count it has been given, so a late call
 * carrying a smaller count never moves the display backwards.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private readonly label: string
  private readonly every?: number
  private readonly write: (line: string) => void
  private highest = 0
  private lastPrinted = 0

  constructor(options: ConsoleProgressOptions = {}) {
    this.label = options.label ?? 'Processing events'
    this.every = options.every
    this.write = options.write ?? (line => console.log(line))
  }

  get completed(): number {
    return this.highest
  }

  report(completed: number, total: number): void {
    if (completed <= this.highest) return
    this.highest = Math.min(completed, total)

    const step = this.every ?? Math.max(1, Math.floor(total / 100))
    if (this.highest === total || this.highest - this.lastPrinted >= step) {
      this.lastPrinted = this.highest
      const pct = total > 0 ? ((this.highest / total) * 100).toFixed(1) : '100.0'
      this.write(`${this.label}: ${this.highest}/${total} (${pct}%)`)
    }
  }
}

/**
 * Wrap a reporter so it can never throw into its caller. The first failure
 * is logged and the reporter is not called again.
 */
export function guardReporter(reporter: ProgressReporter | undefined, logger: Logger): ProgressReporter {
  let broken = reporter === undefined

  return {
    report(completed, total) {
      if (broken || !reporter) return
      try {
        reporter.report(completed, total)
      } catch (error) {
        broken = true
        logger.warn(`Progress reporting disabled: ${toError(error).message}`)
      }
    }
  }
}
