import { describe, it, expect } from 'vitest'
import { isEnriched, mergeRecord } from './merge.js'

const listing = {
  date: '05/08/1977',
  url: 'https://jerrybase.com/events/19770508-01',
  venue: { name: 'Barton Hall', url: 'https://jerrybase.com/venues/1' },
  band: { name: 'Grateful Dead', url: 'https://jerrybase.com/bands/gd' },
  show_id: '19770508-01'
}

describe('mergeRecord', () => {
  it('keeps every listing field and adds the enrichment', () => {
    const merged = mergeRecord(listing, { setlist: ['New Minglewood Blues'], notes: [] })

    expect(merged).toEqual({ ...listing, setlist: ['New Minglewood Blues'], notes: [] })
    expect(listing).not.toHaveProperty('setlist')
  })

  it('lets enrichment fields win on collision', () => {
    const merged = mergeRecord(listing, { date: 'Sunday, May 8, 1977', band: 'Grateful Dead' })

    expect(merged.date).toBe('Sunday, May 8, 1977')
    expect(merged.band).toBe('Grateful Dead')
    expect(merged.venue).toEqual(listing.venue)
  })

  it('ignores undefined enrichment fields', () => {
    expect(mergeRecord(listing, { venue: undefined, setlist: [] })).toEqual({ ...listing, setlist: [] })
  })

  it('returns the original record when enrichment failed', () => {
    expect(mergeRecord(listing, null)).toBe(listing)
  })

  it('is idempotent', () => {
    const enrichment = { setlist: ['Loser'], date_is_placeholder: false }
    const once = mergeRecord(listing, enrichment)

    expect(mergeRecord(once, enrichment)).toEqual(once)
  })
})

describe('isEnriched', () => {
  it('recognises detail page fields', () => {
    expect(isEnriched(listing)).toBe(false)
    expect(isEnriched({ ...listing, setlist: [] })).toBe(true)
    expect(isEnriched({ ...listing, date_is_placeholder: false })).toBe(true)
  })

  it('follows the enrichment status when present', () => {
    expect(isEnriched({ ...listing, enrichment_status: 'done' })).toBe(true)
    expect(isEnriched({ ...listing, enrichment_status: 'failed' })).toBe(false)
  })
})
