/**
 * Spreadsheet export
 * Flattens the enriched year → events file into one worksheet per year
 */

import ExcelJS from 'exceljs'
import type { Workbook } from 'exceljs'
import fs from 'fs'
import path from 'path'
import { loadDataset } from '../../core/dataset.js'
import type { EventRecord, WorkingDataset } from '../../core/types.js'

export const COLUMNS = [
  'year',
  'date',
  'url',
  'venue',
  'band',
  'songs',
  'category',
  'act_type',
  'show_id',
  'date_from_title',
  'date_is_placeholder',
  'date_note',
  'setlist',
  'musicians',
  'notes'
] as const

export type Column = typeof COLUMNS[number]

export type SheetRow = Record<Column, string>

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Cell text of a field: linked names render as their name, arrays as a
 * comma-separated list
 */
function cellText(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (Array.isArray(value)) return value.map(cellText).join(', ')
  if (isObject(value) && typeof value.name === 'string') return value.name
  return JSON.stringify(value)
}

function musiciansText(value: unknown): string {
  if (!Array.isArray(value)) return ''
  return value
    .map(musician => {
      if (!isObject(musician)) return cellText(musician)
      const name = typeof musician.name === 'string' ? musician.name : 'Unknown'
      const instrument = cellText(musician.instrument)
      return instrument ? `${name} - ${instrument}` : name
    })
    .join(', ')
}

/**
 * Rows of one year's worksheet, in event order
 */
export function buildSheetRows(year: string, records: EventRecord[]): SheetRow[] {
  return records.map(record => ({
    year,
    date: cellText(record.date),
    url: cellText(record.url),
    venue: cellText(record.venue),
    band: cellText(record.band),
    songs: cellText(record.songs),
    category: cellText(record.category),
    act_type: cellText(record.act_type),
    show_id: cellText(record.show_id),
    date_from_title: cellText(record.date_from_title),
    date_is_placeholder: cellText(record.date_is_placeholder),
    date_note: cellText(record.date_note),
    setlist: cellText(record.setlist),
    musicians: musiciansText(record.musicians),
    notes: cellText(record.notes)
  }))
}

/**
 * Workbook with one worksheet per year that has at least one event
 */
export function buildWorkbook(dataset: WorkingDataset): Workbook {
  const workbook = new ExcelJS.Workbook()

  for (const [year, records] of Object.entries(dataset)) {
    const rows = buildSheetRows(year, records)
    if (rows.length === 0) continue

    const sheet = workbook.addWorksheet(year)
    sheet.columns = COLUMNS.map(column => ({ header: column, key: column }))
    sheet.addRows(rows)
  }

  return workbook
}

/**
 * Read an enriched dataset file and write it as an .xlsx workbook
 * @returns Number of rows written per year
 */
export async function exportWorkbook(inputPath: string, outputPath: string): Promise<Record<string, number>> {
  const dataset = await loadDataset(inputPath)
  const workbook = buildWorkbook(dataset)

  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  await workbook.xlsx.writeFile(outputPath)

  return Object.fromEntries(workbook.worksheets.map(sheet => [sheet.name, sheet.rowCount - 1]))
}
