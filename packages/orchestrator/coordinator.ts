/**
 * Enrichment coordinator
 *
 * Drives every (year, index, url) task of a dataset through the detail
 * fetcher with at most `maxConcurrent` requests in flight, writes each result
 * into its own slot of the dataset, and hands the dataset to the checkpoint
 * store every `checkpointInterval` completed tasks.
 *
 * Usage:
 *   const coordinator = new EnrichmentCoordinator(dataset, { fetcher, store, logger }, options)
 *   const summary = await coordinator.run()
 */

import pLimit from 'p-limit'
import { ConfigurationError, FetchError, toError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import type {
  CheckpointHandle,
  DetailFetcher,
  EnrichmentSummary,
  EnrichmentTask,
  FetchOutcome,
  WorkingDataset
} from '../core/types.js'
import { isEnriched, mergeRecord } from './merge.js'
import { guardReporter, type ProgressReporter } from './progress.js'

export interface CoordinatorOptions {
  /** Upper bound on simultaneous detail page requests */
  maxConcurrent: number
  /** Milliseconds to wait inside the gate before each request */
  delayBeforeRequest: number
  /** Completed tasks between two checkpoints */
  checkpointInterval: number
  /** Mark records with enrichment_status done/failed */
  trackStatus?: boolean
}

/** The part of the checkpoint store the coordinator needs */
export interface CheckpointSink {
  save(snapshot: WorkingDataset): Promise<CheckpointHandle>
}

export interface CoordinatorDeps {
  fetcher: DetailFetcher
  logger: Logger
  store?: CheckpointSink
  progress?: ProgressReporter
  sleep?: (ms: number) => Promise<void>
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

function assertPositiveInteger(option: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(option, `${option} must be a positive integer, got ${value}`)
  }
}

/**
 * Outstanding tasks of a dataset: records with a URL that carry no
 * enrichment yet, in year then index order
 */
export function collectTasks(dataset: WorkingDataset): { tasks: EnrichmentTask[]; skipped: number } {
  const tasks: EnrichmentTask[] = []
  let skipped = 0

  for (const [year, events] of Object.entries(dataset)) {
    events.forEach((event, index) => {
      if (typeof event.url !== 'string' || event.url.length === 0) return
      if (isEnriched(event)) {
        skipped++
        return
      }
      tasks.push({ year, index, url: event.url })
    })
  }

  return { tasks, skipped }
}

export class EnrichmentCoordinator {
  /** Working dataset; updated in place as tasks complete */
  readonly dataset: WorkingDataset
  /** Fixed when the coordinator is created */
  readonly tasks: readonly EnrichmentTask[]

  private readonly deps: CoordinatorDeps
  private readonly options: CoordinatorOptions
  private readonly skipped: number
  private readonly sleep: (ms: number) => Promise<void>
  private running = false
  private completed = 0
  private succeeded = 0
  private failed = 0
  private checkpoints = 0

  constructor(dataset: WorkingDataset, deps: CoordinatorDeps, options: CoordinatorOptions) {
    assertPositiveInteger('max_concurrent', options.maxConcurrent)
    assertPositiveInteger('checkpoint_interval', options.checkpointInterval)
    if (!Number.isFinite(options.delayBeforeRequest) || options.delayBeforeRequest < 0) {
      throw new ConfigurationError(
        'delay_before_request',
        `delay_before_request must be a non-negative duration, got ${options.delayBeforeRequest}`
      )
    }

    const { tasks, skipped } = collectTasks(dataset)
    this.dataset = dataset
    this.tasks = tasks
    this.skipped = skipped
    this.deps = deps
    this.options = options
    this.sleep = deps.sleep ?? defaultSleep
  }

  /**
   * Run every task to completion. Resolves once all tasks have either
   * succeeded or failed; task failures are logged, never thrown.
   */
  async run(): Promise<EnrichmentSummary> {
    if (this.running) {
      throw new Error('Enrichment run already in progress')
    }
    this.running = true

    const { logger } = this.deps
    const startTime = Date.now()
    const total = this.tasks.length
    const limit = pLimit(this.options.maxConcurrent)
    const progress = guardReporter(this.deps.progress, logger)

    logger.info(`Enriching ${total} event(s) with up to ${this.options.maxConcurrent} concurrent requests`, {
      skipped: this.skipped,
      checkpointInterval: this.options.checkpointInterval
    })

    try {
      await Promise.all(this.tasks.map(async task => {
        const outcome = await limit(() => this.fetchTask(task))
        this.applyOutcome(task, outcome)

        this.completed++
        progress.report(this.completed, total)

        if (this.completed % this.options.checkpointInterval === 0) {
          await this.checkpoint(`${this.completed}/${total} tasks completed`)
        }
      }))
    } finally {
      this.running = false
    }

    const summary: EnrichmentSummary = {
      total,
      completed: this.completed,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped,
      checkpoints: this.checkpoints,
      duration: Date.now() - startTime
    }

    logger.info(
      `Enrichment complete: ${summary.succeeded} enriched, ${summary.failed} failed, ` +
      `${summary.skipped} already enriched (${(summary.duration / 1000).toFixed(1)}s)`
    )

    return summary
  }

  /**
   * Save the current dataset. A failed write is logged and reported as null.
   */
  async checkpoint(reason = 'requested'): Promise<CheckpointHandle | null> {
    const { store, logger } = this.deps
    if (!store) return null

    try {
      const handle = await store.save(this.dataset)
      this.checkpoints++
      logger.info(`Checkpoint written (${reason})`, { path: handle.path })
      return handle
    } catch (error) {
      logger.error(`Checkpoint failed (${reason}): ${toError(error).message}`)
      return null
    }
  }

  /**
   * Pacing delay and fetch; runs while holding a gate slot
   */
  private async fetchTask(task: EnrichmentTask): Promise<FetchOutcome> {
    try {
      if (this.options.delayBeforeRequest > 0) {
        await this.sleep(this.options.delayBeforeRequest)
      }
      return await this.deps.fetcher.fetchAndParse(task.url)
    } catch (error) {
      const cause = toError(error)
      return { ok: false, url: task.url, error: new FetchError(task.url, cause.message, cause) }
    }
  }

  private applyOutcome(task: EnrichmentTask, outcome: FetchOutcome): void {
    const events = this.dataset[task.year]
    const original = events[task.index]

    if (outcome.ok) {
      const merged = mergeRecord(original, outcome.value)
      events[task.index] = this.options.trackStatus ? { ...merged, enrichment_status: 'done' } : merged
      this.succeeded++
      return
    }

    this.failed++
    this.deps.logger.error(`Error processing ${task.url}: ${outcome.error.message}`, {
      url: task.url,
      year: task.year,
      index: task.index
    })
    if (this.options.trackStatus) {
      events[task.index] = { ...original, enrichment_status: 'failed' }
    }
  }
}
