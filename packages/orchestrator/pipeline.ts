/**
 * Enrichment pipeline entry point
 *
 * input file (or latest checkpoint) → coordinator → output file
 */

import { CheckpointStore } from '../core/checkpoint-store.js'
import { cloneDataset, loadDataset, writeJsonAtomic } from '../core/dataset.js'
import type { DetailsOptions } from '../core/config.js'
import type { Logger } from '../core/logger.js'
import type { DetailFetcher, EnrichmentSummary, WorkingDataset } from '../core/types.js'
import { EnrichmentCoordinator } from './coordinator.js'
import type { ProgressReporter } from './progress.js'

export interface EnrichFileDeps {
  fetcher: DetailFetcher
  logger: Logger
  progress?: ProgressReporter
  sleep?: (ms: number) => Promise<void>
  /** Called once the coordinator exists, e.g. to hook signals */
  onStart?: (coordinator: EnrichmentCoordinator) => void
}

export interface EnrichFileResult {
  summary: EnrichmentSummary
  dataset: WorkingDataset
  resumedFromCheckpoint: boolean
}

/**
 * Starting dataset: the latest checkpoint when resuming and one exists,
 * else a fresh copy of the input file
 */
async function loadWorkingDataset(
  options: DetailsOptions,
  store: CheckpointStore,
  logger: Logger
): Promise<{ dataset: WorkingDataset; resumed: boolean }> {
  const input = await loadDataset(options.inputPath)

  if (options.resume) {
    const restored = await store.restore()
    if (restored) {
      return { dataset: restored, resumed: true }
    }
    logger.info('No checkpoint found, starting from the input file')
  }

  return { dataset: cloneDataset(input), resumed: false }
}

/**
 * Enrich every event of the input file and write the output file
 *
 * @throws InputFormatError when the input file is malformed
 * @throws ConfigurationError when an option is out of range
 */
export async function enrichFile(options: DetailsOptions, deps: EnrichFileDeps): Promise<EnrichFileResult> {
  const { logger } = deps
  const store = new CheckpointStore(options.checkpointDir, {
    keep: options.checkpointKeep,
    logger: logger.child('checkpoint')
  })

  const { dataset, resumed } = await loadWorkingDataset(options, store, logger)

  const coordinator = new EnrichmentCoordinator(dataset, {
    fetcher: deps.fetcher,
    logger,
    store,
    progress: deps.progress,
    sleep: deps.sleep
  }, {
    maxConcurrent: options.maxConcurrent,
    delayBeforeRequest: options.delayBeforeRequest,
    checkpointInterval: options.checkpointInterval,
    trackStatus: options.trackStatus
  })

  deps.onStart?.(coordinator)
  const summary = await coordinator.run()

  await writeJsonAtomic(options.outputPath, coordinator.dataset)
  logger.info(`Wrote ${options.outputPath}`)

  return { summary, dataset: coordinator.dataset, resumedFromCheckpoint: resumed }
}
