/**
 * Root configuration for the harvester
 *
 * Values come from the environment (a `.env` file is loaded by the CLI)
 * and fall back to the defaults below. Raw values are validated by
 * packages/core/config.ts before any task uses them.
 */

type RawValue = string | number | boolean | undefined

interface ListingConfig {
  /** Listing page; years are fetched as `${base_url}?year=<year>` */
  base_url: RawValue;
  /** Only crawl the first N years of the selector (unset = all) */
  year_limit: RawValue;
  /** Seconds to wait between two year pages */
  delay_between_years: RawValue;
  /** Where the crawled events are written (input of the details stage) */
  output_path: RawValue;
}

interface DetailsConfig {
  max_concurrent: RawValue;
  /** Seconds, applied before every detail page request */
  delay_before_request: RawValue;
  /** Completed tasks between two checkpoints */
  checkpoint_interval: RawValue;
  /** Snapshots retained in checkpoint_dir */
  checkpoint_keep: RawValue;
  /** Seconds before a detail page request is aborted */
  request_timeout: RawValue;
  input_path: RawValue;
  output_path: RawValue;
  checkpoint_dir: RawValue;
  /** Start from the latest checkpoint when one exists */
  resume: RawValue;
  /** Mark records with enrichment_status done/failed */
  track_status: RawValue;
  log_path: RawValue;
  /** Venue names recognized in detail page headings */
  known_venues: string[];
}

interface ExportConfig {
  input_path: RawValue;
  output_path: RawValue;
}

interface Config {
  jerrybase: {
    listing: ListingConfig;
    details: DetailsConfig;
    export: ExportConfig;
  };
}

const env = process.env

const EVENTS_FILE = env.JERRYBASE_EVENTS_FILE || 'data/event_data.json'
const DETAILED_FILE = env.ENRICH_OUTPUT_FILE || 'data/event_data_detailed.json'

const config: Config = {
  jerrybase: {
    listing: {
      base_url: env.JERRYBASE_BASE_URL || 'https://jerrybase.com/events',
      year_limit: env.JERRYBASE_YEAR_LIMIT || undefined,
      delay_between_years: env.JERRYBASE_DELAY_BETWEEN_YEARS ?? 0.2,
      output_path: EVENTS_FILE,
    },

    details: {
      max_concurrent: env.ENRICH_MAX_CONCURRENT ?? 10,
      delay_before_request: env.ENRICH_DELAY_BEFORE_REQUEST ?? 0.2,
      checkpoint_interval: env.ENRICH_CHECKPOINT_INTERVAL ?? 500,
      checkpoint_keep: env.ENRICH_CHECKPOINT_KEEP ?? 3,
      request_timeout: env.ENRICH_REQUEST_TIMEOUT ?? 30,
      input_path: EVENTS_FILE,
      output_path: DETAILED_FILE,
      checkpoint_dir: env.ENRICH_CHECKPOINT_DIR || 'data/checkpoints',
      resume: env.ENRICH_RESUME ?? true,
      track_status: env.ENRICH_TRACK_STATUS ?? false,
      log_path: env.ENRICH_LOG_FILE || 'data/scraping.log',

      known_venues: [
        'Analy High School',
        'Warfield Theatre'
      ],
    },

    export: {
      input_path: DETAILED_FILE,
      output_path: env.EXPORT_WORKBOOK_FILE || 'data/concert_data.xlsx',
    },
  }
}

export default config
