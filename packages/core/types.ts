/**
 * Core types for the harvesting pipeline
 */

import type { FetchError } from './errors.js'

/** A name/link pair as it appears in listing table cells */
export interface LinkedName {
  name: string
  url: string
}

/**
 * One event record. Its identity is its position within the year's array.
 * Only `url` is required to be a string; every other field passes through
 * the pipeline untouched unless enrichment overwrites it.
 */
export interface EventRecord {
  url?: string
  [field: string]: unknown
}

/** Record shape produced by the listing crawl */
export type ListingEvent = {
  date: string
  url: string
  venue: LinkedName
  band: LinkedName
  songs: string
  category: string
  act_type: string
  show_id: string
}

export interface Musician {
  name: string
  instrument: string
}

/**
 * Fields only available on an event's detail page. A field the page does
 * not carry is left out rather than set to null.
 */
export interface EnrichmentResult {
  date_from_title?: string
  date?: string
  date_is_placeholder?: boolean
  /** Placeholder marker text of the page, or the site's "may be accurate" wording */
  date_note?: string
  band?: string
  venue?: string
  setlist?: string[]
  musicians?: Musician[]
  notes?: string[]
}

export type EnrichmentStatus = 'done' | 'failed'

/** Year (string key) → ordered events of that year */
export type WorkingDataset = Record<string, EventRecord[]>

/** One unit of enrichment work */
export interface EnrichmentTask {
  year: string
  index: number
  url: string
}

export interface CheckpointHandle {
  name: string
  path: string
  savedAt: Date
}

export interface EnrichmentSummary {
  total: number
  completed: number
  succeeded: number
  failed: number
  /** Records with a URL that were already enriched when the run started */
  skipped: number
  checkpoints: number
  duration: number               // milliseconds
}

export type FetchOutcome =
  | { ok: true; url: string; value: EnrichmentResult }
  | { ok: false; url: string; error: FetchError }

/** Fetches one detail page and extracts its fields; never rejects */
export interface DetailFetcher {
  fetchAndParse(url: string): Promise<FetchOutcome>
}
