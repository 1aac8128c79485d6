/**
 * Jerrybase event page parser
 * Extracts the detail-only fields of one event page
 */

import * as cheerio from 'cheerio'
import { hasChildren, isText, type AnyNode } from 'domhandler'
import { ParseError } from '../../core/errors.js'
import type { EnrichmentResult, Musician } from '../../core/types.js'

/** Site wording for a date shown without a placeholder marker */
export const DATE_MAY_BE_ACCURATE = 'Date might be accurate'

export const DEFAULT_KNOWN_VENUES = ['Analy High School', 'Warfield Theatre']

export interface ParseOptions {
  /** Venue names recognized in page headings */
  knownVenues?: string[]
}

type Page = cheerio.CheerioAPI

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Parse an event detail page
 *
 * Fields the page does not carry are left out. Only a page without a
 * <title> is rejected, since every event page has one.
 *
 * @throws ParseError when the page is not an event page
 */
export function parseEventPage(html: string, options: ParseOptions = {}): EnrichmentResult {
  const $ = cheerio.load(html)

  const title = clean($('title').first().text())
  if (!title) {
    throw new ParseError('Page has no <title>; not an event page')
  }

  const result: EnrichmentResult = {}

  // Title is "<date> <band>"
  const [dateFromTitle, ...bandWords] = title.split(' ')
  result.date_from_title = dateFromTitle
  if (bandWords.length > 0) result.band = bandWords.join(' ')

  const date = clean($('h4[style="display: inline;"]').first().text())
  if (date) result.date = date
  const placeholder = $('span.text-muted').first()
  result.date_is_placeholder = placeholder.length > 0
  result.date_note = placeholder.length > 0 ? clean(placeholder.text()) : DATE_MAY_BE_ACCURATE

  const venue = extractVenue($, options.knownVenues ?? DEFAULT_KNOWN_VENUES)
  if (venue) result.venue = venue

  result.setlist = extractSetlist($)
  result.musicians = extractMusicians($)
  result.notes = $('div.notes-container li')
    .map((_, li) => clean($(li).text()))
    .get()
    .filter(note => note.length > 0)

  return result
}

function extractVenue($: Page, knownVenues: string[]): string | undefined {
  const heading = $('h4').filter((_, el) => {
    const text = $(el).text()
    return knownVenues.some(name => text.includes(name))
  }).first()

  const venue = clean(heading.text())
  return venue || undefined
}

/**
 * Songs of the partial set card, or else the first link of every row of
 * the setlist table
 */
function extractSetlist($: Page): string[] {
  const fromCard = $('div#simple-card a')
    .filter((_, el) => !$(el).attr('class'))
    .map((_, el) => clean($(el).text()))
    .get()
    .filter(song => song.length > 0)

  if (fromCard.length > 0) return fromCard

  const table = $('table[id^="datatable_"]').first()
  return table.find('tr')
    .map((_, row) => clean($(row).find('a').first().text()))
    .get()
    .filter(song => song.length > 0)
}

/**
 * The musicians block alternates name and "- instrument" text nodes
 */
function extractMusicians($: Page): Musician[] {
  const container = $('div#musicians-content')
  if (container.length === 0) return []

  const lines: string[] = []
  const walk = (nodes: AnyNode[]): void => {
    for (const node of nodes) {
      if (isText(node)) {
        const line = clean(node.data)
        if (line) lines.push(line)
      } else if (hasChildren(node)) {
        walk(node.children)
      }
    }
  }
  walk(container.get())

  const musicians: Musician[] = []
  for (let i = 0; i < lines.length; i += 2) {
    const name = lines[i]
    const instrument = i + 1 < lines.length ? lines[i + 1].replace(/^[-\s]+|[-\s]+$/g, '') : 'unknown'
    musicians.push({ name, instrument: instrument || 'unknown' })
  }
  return musicians
}
