/**
 * Dataset files
 *
 * Reading and validating year → events JSON files, and writing JSON
 * through a temporary file so readers never see a partial document.
 */

import fs from 'fs'
import fsp from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { InputFormatError, toError } from './errors.js'
import type { WorkingDataset } from './types.js'

const eventRecordSchema = z.object({ url: z.string().optional() }).passthrough()

export const datasetSchema = z.record(z.string(), z.array(eventRecordSchema))

/**
 * Validate a parsed JSON value as a dataset
 * @returns Error description, or the dataset
 */
export function validateDataset(value: unknown): { ok: true; dataset: WorkingDataset } | { ok: false; reason: string } {
  const parsed = datasetSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    return { ok: false, reason: `${issue.message}${where}` }
  }
  return { ok: true, dataset: parsed.data }
}

/**
 * Load the year → events input file
 * @throws InputFormatError when the file is unreadable or malformed
 */
export async function loadDataset(filePath: string): Promise<WorkingDataset> {
  let text: string
  try {
    text = await fsp.readFile(filePath, 'utf8')
  } catch (error) {
    throw new InputFormatError(filePath, `Cannot read input file ${filePath}: ${toError(error).message}`, toError(error))
  }

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw new InputFormatError(filePath, `Input file ${filePath} is not valid JSON: ${toError(error).message}`, toError(error))
  }

  const result = validateDataset(value)
  if (!result.ok) {
    throw new InputFormatError(filePath, `Input file ${filePath} is not a year → events mapping: ${result.reason}`)
  }
  return result.dataset
}

/**
 * Deep copy of a dataset, sharing nothing with the source
 */
export function cloneDataset(dataset: WorkingDataset): WorkingDataset {
  return structuredClone(dataset)
}

/**
 * Write text to `filePath` via `<filePath>.tmp` + rename
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`
  await fsp.mkdir(path.dirname(filePath), { recursive: true })
  try {
    await fsp.writeFile(tmpPath, contents, 'utf8')
    await fsp.rename(tmpPath, filePath)
  } catch (error) {
    await fsp.rm(tmpPath, { force: true })
    throw error
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2))
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath)
}
