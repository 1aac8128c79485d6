import { describe, it, expect } from 'vitest'
import { createMemoryLogger } from '../core/logger.js'
import { ConsoleProgressReporter, guardReporter } from './progress.js'

describe('ConsoleProgressReporter', () => {
  it('prints completed/total with a percentage', () => {
    const lines: string[] = []
    const reporter = new ConsoleProgressReporter({ write: line => lines.push(line) })

    reporter.report(1, 4)
    reporter.report(4, 4)

    expect(lines).toEqual(['Processing events: 1/4 (25.0%)', 'Processing events: 4/4 (100.0%)'])
  })

  it('never moves backwards', () => {
    const lines: string[] = []
    const reporter = new ConsoleProgressReporter({ label: 'Events', write: line => lines.push(line) })

    reporter.report(3, 4)
    reporter.report(2, 4)

    expect(reporter.completed).toBe(3)
    expect(lines).toEqual(['Events: 3/4 (75.0%)'])
  })

  it('prints every percent of large runs', () => {
    const lines: string[] = []
    const reporter = new ConsoleProgressReporter({ write: line => lines.push(line) })

    for (let n = 1; n <= 25; n++) reporter.report(n, 1000)

    expect(lines).toEqual(['Processing events: 10/1000 (1.0%)', 'Processing events: 20/1000 (2.0%)'])
  })

  it('honours an explicit step', () => {
    const lines: string[] = []
    const reporter = new ConsoleProgressReporter({ every: 2, write: line => lines.push(line) })

    for (let n = 1; n <= 5; n++) reporter.report(n, 5)

    expect(lines).toEqual([
      'Processing events: 2/5 (40.0%)',
      'Processing events: 4/5 (80.0%)',
      'Processing events: 5/5 (100.0%)'
    ])
  })
})

describe('guardReporter', () => {
  it('disables a reporter after its first failure', () => {
    const logger = createMemoryLogger()
    let calls = 0
    const guarded = guardReporter({
      report() {
        calls++
        throw new Error('terminal closed')
      }
    }, logger)

    guarded.report(1, 2)
    guarded.report(2, 2)

    expect(calls).toBe(1)
    expect(logger.entries.map(entry => [entry.level, entry.message])).toEqual([
      ['warn', 'Progress reporting disabled: terminal closed']
    ])
  })

  it('accepts a missing reporter', () => {
    expect(() => guardReporter(undefined, createMemoryLogger()).report(1, 1)).not.toThrow()
  })
})
