import { describe, it, expect, vi } from 'vitest'
import fs from 'fs'
import fsp from 'fs/promises'
import os from 'os'
import path from 'path'
import { CheckpointStore } from '../core/checkpoint-store.js'
import { ConfigurationError, FetchError } from '../core/errors.js'
import { createLogger, createMemoryLogger } from '../core/logger.js'
import type { CheckpointHandle, DetailFetcher, EnrichmentResult, WorkingDataset } from '../core/types.js'
import { collectTasks, EnrichmentCoordinator, type CheckpointSink } from './coordinator.js'

const options = { maxConcurrent: 2, delayBeforeRequest: 0, checkpointInterval: 500 }

/** Fetcher answering from a table; URLs without an entry fail */
function tableFetcher(pages: Record<string, EnrichmentResult>, calls: string[] = []): DetailFetcher {
  return {
    async fetchAndParse(url) {
      calls.push(url)
      const value = pages[url]
      return value
        ? { ok: true, url, value }
        : { ok: false, url, error: new FetchError(url, `Failed to fetch ${url}: HTTP 404`) }
    }
  }
}

/** Store keeping a deep copy of every snapshot it is given */
function recordingStore(): CheckpointSink & { snapshots: WorkingDataset[] } {
  const snapshots: WorkingDataset[] = []
  return {
    snapshots,
    async save(snapshot): Promise<CheckpointHandle> {
      snapshots.push(structuredClone(snapshot))
      const name = `checkpoint-${snapshots.length}.json`
      return { name, path: `/checkpoints/${name}`, savedAt: new Date() }
    }
  }
}

function urls(count: number): WorkingDataset {
  return { '2020': Array.from({ length: count }, (_, i) => ({ url: `http://x/${i + 1}` })) }
}

describe('collectTasks', () => {
  it('lists records with a URL and no enrichment, in year and index order', () => {
    const dataset: WorkingDataset = {
      '1970': [{ url: 'http://x/a' }, { url: '' }, { date: 'n/a' }],
      '1971': [{ url: 'http://x/b', setlist: [] }, { url: 'http://x/c' }]
    }

    expect(collectTasks(dataset)).toEqual({
      tasks: [
        { year: '1970', index: 0, url: 'http://x/a' },
        { year: '1971', index: 1, url: 'http://x/c' }
      ],
      skipped: 1
    })
  })
})

describe('EnrichmentCoordinator', () => {
  it('merges successes and leaves failed records untouched', async () => {
    const logger = createMemoryLogger()
    const dataset = urls(2)
    const coordinator = new EnrichmentCoordinator(dataset, {
      fetcher: tableFetcher({ 'http://x/1': { setlist: ['Song A'] } }),
      logger
    }, options)

    const summary = await coordinator.run()

    expect(dataset).toEqual({ '2020': [{ url: 'http://x/1', setlist: ['Song A'] }, { url: 'http://x/2' }] })
    expect(summary).toMatchObject({ total: 2, completed: 2, succeeded: 1, failed: 1, skipped: 0, checkpoints: 0 })

    const errors = logger.entries.filter(entry => entry.level === 'error')
    expect(errors).toHaveLength(1)
    expect(errors[0].message).toBe('Error processing http://x/2: Failed to fetch http://x/2: HTTP 404')
    expect(errors[0].fields).toEqual({ url: 'http://x/2', year: '2020', index: 1 })
  })

  it('never runs more than maxConcurrent requests at once', async () => {
    let inFlight = 0
    let peak = 0
    const fetcher: DetailFetcher = {
      async fetchAndParse(url) {
        inFlight++
        peak = Math.max(peak, inFlight)
        await new Promise(resolve => setTimeout(resolve, 5))
        inFlight--
        return { ok: true, url, value: { notes: [] } }
      }
    }

    const coordinator = new EnrichmentCoordinator(urls(12), { fetcher, logger: createMemoryLogger() }, {
      ...options,
      maxConcurrent: 3
    })
    const summary = await coordinator.run()

    expect(peak).toBe(3)
    expect(summary.succeeded).toBe(12)
  })

  it('waits the pacing delay before every request', async () => {
    const delays: number[] = []
    const coordinator = new EnrichmentCoordinator(urls(3), {
      fetcher: tableFetcher({}),
      logger: createMemoryLogger(),
      sleep: async ms => { delays.push(ms) }
    }, { ...options, delayBeforeRequest: 200 })

    await coordinator.run()

    expect(delays).toEqual([200, 200, 200])
  })

  it('turns a throwing fetcher into a failed task', async () => {
    const logger = createMemoryLogger()
    const dataset = urls(1)
    const coordinator = new EnrichmentCoordinator(dataset, {
      fetcher: { fetchAndParse: () => Promise.reject(new Error('socket hang up')) },
      logger
    }, options)

    const summary = await coordinator.run()

    expect(summary.failed).toBe(1)
    expect(dataset).toEqual(urls(1))
    expect(logger.entries.some(entry => entry.message === 'Error processing http://x/1: socket hang up')).toBe(true)
  })

  it('checkpoints every interval, counting failed tasks', async () => {
    const store = recordingStore()
    const pages = { 'http://x/1': { setlist: ['A'] }, 'http://x/3': { setlist: ['C'] } }
    const coordinator = new EnrichmentCoordinator(urls(5), {
      fetcher: tableFetcher(pages),
      logger: createMemoryLogger(),
      store
    }, { ...options, checkpointInterval: 2 })

    const summary = await coordinator.run()

    expect(store.snapshots).toHaveLength(2)
    expect(summary.checkpoints).toBe(2)
  })

  it('checkpoints after each task when the interval is 1, keeping only the newest file', async () => {
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'coordinator-'))
    try {
      const store = new CheckpointStore(dir, { keep: 1, logger: createMemoryLogger() })
      const files: string[][] = []
      const contents: Array<WorkingDataset | null> = []
      let firstSaved = (): void => {}
      const afterFirst = new Promise<void>(resolve => { firstSaved = resolve })

      const sink: CheckpointSink = {
        async save(snapshot) {
          const handle = await store.save(snapshot)
          files.push(await store.list())
          contents.push(await store.restore())
          firstSaved()
          return handle
        }
      }
      const fetcher: DetailFetcher = {
        async fetchAndParse(url) {
          if (url === 'http://x/2') {
            await afterFirst
            return { ok: true, url, value: { setlist: ['Song B'] } }
          }
          return { ok: true, url, value: { setlist: ['Song A'] } }
        }
      }

      const coordinator = new EnrichmentCoordinator(urls(2), {
        fetcher,
        logger: createMemoryLogger(),
        store: sink
      }, { ...options, checkpointInterval: 1 })

      await coordinator.run()

      expect(files.map(names => names.length)).toEqual([1, 1])
      expect(files[1][0]).not.toBe(files[0][0])
      expect(contents).toEqual([
        { '2020': [{ url: 'http://x/1', setlist: ['Song A'] }, { url: 'http://x/2' }] },
        { '2020': [{ url: 'http://x/1', setlist: ['Song A'] }, { url: 'http://x/2', setlist: ['Song B'] }] }
      ])
      expect(await store.list()).toEqual(files[1])
    } finally {
      await fsp.rm(dir, { recursive: true, force: true })
    }
  })

  it('logs a failed checkpoint and keeps going', async () => {
    const logger = createMemoryLogger()
    const coordinator = new EnrichmentCoordinator(urls(2), {
      fetcher: tableFetcher({ 'http://x/1': { setlist: ['A'] }, 'http://x/2': { setlist: ['B'] } }),
      logger,
      store: { save: () => Promise.reject(new Error('disk full')) }
    }, { ...options, checkpointInterval: 1 })

    const summary = await coordinator.run()

    expect(summary).toMatchObject({ succeeded: 2, checkpoints: 0 })
    expect(logger.entries.filter(entry => entry.message.startsWith('Checkpoint failed'))).toHaveLength(2)
  })

  it('finishes the run when the log file stops accepting writes', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'coordinator-'))
    try {
      const file = path.join(dir, 'scraping.log')
      const messages: string[] = []
      const logger = createLogger({ scope: 'details', file, console: false, sink: entry => messages.push(entry.message) })
      const dataset = urls(2)
      const fetcher: DetailFetcher = {
        async fetchAndParse(url) {
          if (url === 'http://x/2') {
            fs.rmSync(file, { force: true })
            fs.mkdirSync(file)
            return { ok: false, url, error: new FetchError(url, `Failed to fetch ${url}: HTTP 500`) }
          }
          return { ok: true, url, value: { setlist: ['Song A'] } }
        }
      }

      const summary = await new EnrichmentCoordinator(dataset, { fetcher, logger }, { ...options, maxConcurrent: 1 }).run()

      expect(summary).toMatchObject({ completed: 2, succeeded: 1, failed: 1 })
      expect(dataset).toEqual({ '2020': [{ url: 'http://x/1', setlist: ['Song A'] }, { url: 'http://x/2' }] })
      expect(messages).toContain('Error processing http://x/2: Failed to fetch http://x/2: HTTP 500')
      expect(consoleError).toHaveBeenCalledTimes(1)
    } finally {
      consoleError.mockRestore()
      await fsp.rm(dir, { recursive: true, force: true })
    }
  })

  it('skips records enriched by an earlier run', async () => {
    const calls: string[] = []
    const dataset: WorkingDataset = {
      '2020': [{ url: 'http://x/1', setlist: ['A'] }, { url: 'http://x/2' }]
    }
    const coordinator = new EnrichmentCoordinator(dataset, {
      fetcher: tableFetcher({ 'http://x/2': { setlist: ['B'] } }, calls),
      logger: createMemoryLogger()
    }, options)

    const summary = await coordinator.run()

    expect(calls).toEqual(['http://x/2'])
    expect(summary).toMatchObject({ total: 1, succeeded: 1, skipped: 1 })
  })

  it('marks records with their status when asked to', async () => {
    const dataset = urls(2)
    const pages = { 'http://x/1': { setlist: ['A'] } }
    const coordinator = new EnrichmentCoordinator(dataset, {
      fetcher: tableFetcher(pages),
      logger: createMemoryLogger()
    }, { ...options, trackStatus: true })

    await coordinator.run()

    expect(dataset['2020']).toEqual([
      { url: 'http://x/1', setlist: ['A'], enrichment_status: 'done' },
      { url: 'http://x/2', enrichment_status: 'failed' }
    ])

    const calls: string[] = []
    await new EnrichmentCoordinator(dataset, {
      fetcher: tableFetcher(pages, calls),
      logger: createMemoryLogger()
    }, { ...options, trackStatus: true }).run()

    expect(calls).toEqual(['http://x/2'])
  })

  it('keeps running when the progress reporter throws', async () => {
    const logger = createMemoryLogger()
    const coordinator = new EnrichmentCoordinator(urls(3), {
      fetcher: tableFetcher({}),
      logger,
      progress: { report: () => { throw new Error('broken pipe') } }
    }, options)

    const summary = await coordinator.run()

    expect(summary.completed).toBe(3)
    expect(logger.entries.filter(entry => entry.level === 'warn').map(entry => entry.message)).toEqual([
      'Progress reporting disabled: broken pipe'
    ])
  })

  it('reports progress up to the total', async () => {
    const reports: Array<[number, number]> = []
    const coordinator = new EnrichmentCoordinator(urls(3), {
      fetcher: tableFetcher({}),
      logger: createMemoryLogger(),
      progress: { report: (completed, total) => { reports.push([completed, total]) } }
    }, options)

    await coordinator.run()

    expect(reports).toEqual([[1, 3], [2, 3], [3, 3]])
  })

  it('finishes at once when there is nothing to do', async () => {
    const store = recordingStore()
    const coordinator = new EnrichmentCoordinator({ '2020': [] }, {
      fetcher: tableFetcher({}),
      logger: createMemoryLogger(),
      store
    }, options)

    expect(await coordinator.run()).toMatchObject({ total: 0, completed: 0, checkpoints: 0 })
    expect(store.snapshots).toEqual([])
  })

  it.each([
    [{ maxConcurrent: 0 }, 'max_concurrent'],
    [{ checkpointInterval: 0 }, 'checkpoint_interval'],
    [{ checkpointInterval: 1.5 }, 'checkpoint_interval'],
    [{ delayBeforeRequest: -1 }, 'delay_before_request']
  ])('rejects %o', (override, option) => {
    const create = () => new EnrichmentCoordinator(urls(1), {
      fetcher: tableFetcher({}),
      logger: createMemoryLogger()
    }, { ...options, ...override })

    expect(create).toThrow(ConfigurationError)
    expect(create).toThrow(option)
  })
})
