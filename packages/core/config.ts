/**
 * Validation of raw configuration values
 *
 * Turns the loosely typed values of the root config (strings from the
 * environment, numbers from defaults) into typed option objects. Every
 * failure is reported as a ConfigurationError naming the option.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.js'

const seconds = z.coerce.number().finite().nonnegative()

const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform(value => ['true', '1', 'yes'].includes(value))
])

const filePath = z.string().trim().min(1)

export const detailsSchema = z.object({
  max_concurrent: z.coerce.number().int().positive().default(10),
  delay_before_request: seconds.default(0.2),
  checkpoint_interval: z.coerce.number().int().positive().default(500),
  checkpoint_keep: z.coerce.number().int().positive().default(3),
  request_timeout: z.coerce.number().finite().positive().default(30),
  input_path: filePath,
  output_path: filePath,
  checkpoint_dir: filePath,
  resume: flag.default(true),
  track_status: flag.default(false),
  log_path: filePath.optional(),
  known_venues: z.array(z.string().min(1)).optional()
})

export const listingSchema = z.object({
  base_url: z.string().url(),
  year_limit: z.coerce.number().int().positive().optional(),
  delay_between_years: seconds.default(0.2),
  output_path: filePath
})

export const exportSchema = z.object({
  input_path: filePath,
  output_path: filePath
})

export interface DetailsOptions {
  maxConcurrent: number
  /** Milliseconds */
  delayBeforeRequest: number
  checkpointInterval: number
  checkpointKeep: number
  /** Milliseconds */
  requestTimeout: number
  inputPath: string
  outputPath: string
  checkpointDir: string
  resume: boolean
  trackStatus: boolean
  logPath?: string
  knownVenues?: string[]
}

export interface ListingOptions {
  baseUrl: string
  yearLimit?: number
  /** Milliseconds */
  delayBetweenYears: number
  outputPath: string
}

export interface ExportOptions {
  inputPath: string
  outputPath: string
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, section: string): z.output<T> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const option = issue.path.length > 0 ? issue.path.join('.') : section
    throw new ConfigurationError(option, `Invalid ${section} option "${option}": ${issue.message}`)
  }
  return parsed.data
}

/** Empty strings from the environment mean "not set" */
function dropEmpty(raw: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== '' && value !== undefined))
}

export function resolveDetailsOptions(raw: object): DetailsOptions {
  const values = parseWith(detailsSchema, dropEmpty(raw), 'details')
  return {
    maxConcurrent: values.max_concurrent,
    delayBeforeRequest: Math.round(values.delay_before_request * 1000),
    checkpointInterval: values.checkpoint_interval,
    checkpointKeep: values.checkpoint_keep,
    requestTimeout: Math.round(values.request_timeout * 1000),
    inputPath: values.input_path,
    outputPath: values.output_path,
    checkpointDir: values.checkpoint_dir,
    resume: values.resume,
    trackStatus: values.track_status,
    logPath: values.log_path,
    knownVenues: values.known_venues
  }
}

export function resolveListingOptions(raw: object): ListingOptions {
  const values = parseWith(listingSchema, dropEmpty(raw), 'listing')
  return {
    baseUrl: values.base_url,
    yearLimit: values.year_limit,
    delayBetweenYears: Math.round(values.delay_between_years * 1000),
    outputPath: values.output_path
  }
}

export function resolveExportOptions(raw: object): ExportOptions {
  const values = parseWith(exportSchema, dropEmpty(raw), 'export')
  return {
    inputPath: values.input_path,
    outputPath: values.output_path
  }
}
