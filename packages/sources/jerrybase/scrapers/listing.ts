import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { fetchHtml, type FetchImpl } from '../client.js';
import { errorMessage } from '../../../core/errors.js';
import type { Logger } from '../../../core/logger.js';
import type { LinkedName, ListingEvent, WorkingDataset } from '../../../core/types.js';

/**
 * Jerrybase Listing Crawler
 *
 * Purpose: Discover the available years and every event row of each year
 * Method: Plain HTTP fetch, one page per year, sequential
 *
 * Usage:
 *   import { crawlListing } from './scrapers/listing.js'
 *
 *   const dataset = await crawlListing({ baseUrl: 'https://jerrybase.com/events', logger })
 */

const MIN_CELLS = 7;

type Cell = Cheerio<Element>;

export interface CrawlListingOptions {
  baseUrl: string;
  logger: Logger;
  /** Only crawl the first N years of the selector */
  yearLimit?: number;
  /** Milliseconds between two year pages */
  delayBetweenYears?: number;
  fetchImpl?: FetchImpl;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Year values of the year selector
 * @param html - Listing page HTML
 * @returns Years in selector order
 */
export function extractYearOptions(html: string): string[] {
  const $ = cheerio.load(html);
  return $('select#year-select option')
    .map((_, option) => $(option).attr('value') ?? '')
    .get()
    .filter(year => year.length > 0);
}

/**
 * Build the listing URL of one year
 */
export function yearUrl(baseUrl: string, year: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('year', year);
  return url.toString();
}

/**
 * Event rows of a listing page
 * @param html - Listing page HTML
 * @param baseUrl - Base for resolving relative links
 * @returns Events in table order; empty when the page has no events table
 */
export function extractEventsFromHtml(html: string, baseUrl: string): ListingEvent[] {
  const $ = cheerio.load(html);
  const table = $('table#datatable_events');
  if (table.length === 0) return [];

  const resolve = (href: string | undefined): string => (href ? new URL(href, baseUrl).toString() : '');
  const text = (cell: Cell): string => cell.text().trim();

  const linked = (cell: Cell): LinkedName => ({
    name: text(cell),
    url: resolve(cell.find('a').first().attr('href')),
  });

  const events: ListingEvent[] = [];

  table.find('tbody tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < MIN_CELLS) return;

    const dateCell = cells.eq(0);
    events.push({
      date: dateCell.find('span').first().text().trim(),
      url: resolve(dateCell.find('a').first().attr('href')),
      venue: linked(cells.eq(1)),
      band: linked(cells.eq(2)),
      songs: text(cells.eq(3)),
      category: text(cells.eq(4)),
      act_type: text(cells.eq(5)),
      show_id: text(cells.eq(6)),
    });
  });

  return events;
}

/**
 * Crawl the year selector and each year's listing page
 * @returns Year → events, in selector order
 * @throws Error when the base page cannot be fetched; a failing year is logged and left out
 */
export async function crawlListing(options: CrawlListingOptions): Promise<WorkingDataset> {
  const {
    baseUrl,
    logger,
    yearLimit,
    delayBetweenYears = 200,
    fetchImpl,
    timeoutMs,
    sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)),
  } = options;

  const years = extractYearOptions(await fetchHtml(baseUrl, { fetchImpl, timeoutMs }));
  const selected = yearLimit ? years.slice(0, yearLimit) : years;

  logger.info(`Available years: ${years.length}, crawling ${selected.length}`);

  const dataset: WorkingDataset = {};

  for (let i = 0; i < selected.length; i++) {
    const year = selected[i];
    const url = yearUrl(baseUrl, year);

    try {
      const events = extractEventsFromHtml(await fetchHtml(url, { fetchImpl, timeoutMs }), baseUrl);
      dataset[year] = events;
      logger.info(`Found ${events.length} events for ${year}`, { url });
    } catch (error) {
      logger.error(`Failed to fetch events for ${year}: ${errorMessage(error)}`, { url });
    }

    if (i < selected.length - 1 && delayBetweenYears > 0) {
      await sleep(delayBetweenYears);
    }
  }

  return dataset;
}
