/**
 * Merge of listing records with detail page enrichment
 */

import type { EnrichmentResult, EventRecord } from '../core/types.js'

/**
 * Fields that only ever come from a detail page. A record carrying any of
 * them has been enriched already.
 */
export const ENRICHMENT_ONLY_FIELDS = [
  'date_from_title',
  'date_is_placeholder',
  'date_note',
  'setlist',
  'musicians',
  'notes'
] as const

/**
 * Combine a record with its enrichment.
 *
 * Every field of `original` is kept; fields present in `enrichment` win on
 * collision. A failed enrichment (`null`) returns `original` itself.
 */
export function mergeRecord(original: EventRecord, enrichment: EnrichmentResult | null): EventRecord {
  if (!enrichment) return original

  const merged: EventRecord = { ...original }
  for (const [field, value] of Object.entries(enrichment)) {
    if (value !== undefined) merged[field] = value
  }
  return merged
}

/**
 * Whether a record already holds detail page fields
 */
export function isEnriched(record: EventRecord): boolean {
  if (record.enrichment_status === 'done') return true
  return ENRICHMENT_ONLY_FIELDS.some(field => record[field] !== undefined)
}
