/**
 * Jerrybase Task Definitions
 *
 * Defines the three stages of the Jerrybase harvest. Tasks are discovered
 * and run by the orchestrator.
 */

import config from '../../../config.js'
import { resolveDetailsOptions, resolveExportOptions, resolveListingOptions } from '../../core/config.js'
import { writeJsonAtomic } from '../../core/dataset.js'
import { createLogger } from '../../core/logger.js'
import type { Task } from '../../orchestrator/runner.js'
import { enrichFile } from '../../orchestrator/pipeline.js'
import { ConsoleProgressReporter } from '../../orchestrator/progress.js'
import { checkpointOnSignal } from '../../orchestrator/signals.js'
import { exportWorkbook } from './export.js'
import { createDetailFetcher } from './scrapers/details.js'
import { crawlListing } from './scrapers/listing.js'

const tasks: Task[] = [
  /**
   * Task: Crawl listings
   * Method: HTTP fetch of the year selector, then one listing page per year
   * Output: year → events JSON (input of jerrybase:details)
   */
  {
    id: 'jerrybase:listing',
    stage: 'listing',
    description: 'Crawl the year selector and every year listing into the events file',

    async run() {
      const options = resolveListingOptions(config.jerrybase.listing)
      const logger = createLogger({ scope: 'jerrybase:listing' })

      logger.info(`Crawling ${options.baseUrl}...`)
      const dataset = await crawlListing({
        baseUrl: options.baseUrl,
        yearLimit: options.yearLimit,
        delayBetweenYears: options.delayBetweenYears,
        logger
      })

      const years = Object.keys(dataset)
      const events = Object.values(dataset).reduce((sum, list) => sum + list.length, 0)
      if (years.length === 0) {
        throw new Error(`No years found at ${options.baseUrl}; the listing page layout may have changed`)
      }

      await writeJsonAtomic(options.outputPath, dataset)
      logger.info(`Saved ${events} events across ${years.length} years to ${options.outputPath}`)

      return { years: years.length, events }
    }
  },

  /**
   * Task: Enrich events
   * Method: Bounded-concurrency fetch of every event page, checkpointed
   * Resumable: restarts from the latest checkpoint in checkpoint_dir
   */
  {
    id: 'jerrybase:details',
    stage: 'details',
    description: 'Fetch every event detail page and merge setlist, musicians and notes into the events',

    async run() {
      const options = resolveDetailsOptions(config.jerrybase.details)
      const logger = createLogger({ scope: 'jerrybase:details', file: options.logPath })

      const fetcher = createDetailFetcher({
        timeoutMs: options.requestTimeout,
        knownVenues: options.knownVenues
      })

      let removeHandlers = (): void => {}
      try {
        const { summary, resumedFromCheckpoint } = await enrichFile(options, {
          fetcher,
          logger,
          progress: new ConsoleProgressReporter({ label: '[jerrybase:details] Processing events' }),
          onStart: coordinator => {
            removeHandlers = checkpointOnSignal(coordinator, { log: message => logger.warn(message) })
          }
        })

        return { ...summary, resumedFromCheckpoint }
      } finally {
        removeHandlers()
      }
    }
  },

  /**
   * Task: Export workbook
   * Output: one worksheet per year with a fixed column order
   */
  {
    id: 'jerrybase:export',
    stage: 'export',
    description: 'Write the enriched events to an .xlsx workbook, one sheet per year',

    async run() {
      const options = resolveExportOptions(config.jerrybase.export)
      const logger = createLogger({ scope: 'jerrybase:export' })

      logger.info(`Reading ${options.inputPath}`)
      const sheets = await exportWorkbook(options.inputPath, options.outputPath)

      for (const [year, rows] of Object.entries(sheets)) {
        logger.info(`Sheet ${year}: ${rows} entries`)
      }
      logger.info(`Workbook written to ${options.outputPath}`)

      return { sheets: Object.keys(sheets).length }
    }
  }
]

export default tasks
