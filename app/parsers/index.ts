// CSV parsing into column-ordered tables

import * as fs from 'fs'
import * as XLSX from 'xlsx'
import { InputLoadError, errorMessage } from '../errors'
import type { DataRow, Table } from '../types'

function normalizeValueCsv(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }
  // Cells are kept as text; the validator decides what parses
  return String(value)
}

/**
 * Parse CSV text with a header row. Every cell is kept as a string.
 */
export function parseCsvText(content: string, source: string = 'input'): Table {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content

  let rows: unknown[][]
  try {
    // raw: true keeps numbers, dates and booleans as their original text
    const workbook = XLSX.read(text, { type: 'string', raw: true })
    const sheetName = workbook.SheetNames[0]
    if (!sheetName) {
      throw new Error('No data found in CSV file')
    }
    const worksheet = workbook.Sheets[sheetName]
    if (!worksheet) {
      throw new Error('Could not read CSV data')
    }
    rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      raw: true,
      defval: '',
      blankrows: false
    })
  } catch (error) {
    throw new InputLoadError(`Cannot load input ${source}: ${errorMessage(error)}`, source)
  }

  const [headerRow, ...dataRows] = rows
  if (!headerRow || headerRow.length === 0) {
    throw new InputLoadError(`Cannot load input ${source}: missing header row`, source)
  }

  const columns = headerRow.map(cell => normalizeValueCsv(cell).trim())
  const duplicates = columns.filter((column, index) => columns.indexOf(column) !== index)
  if (duplicates.length > 0) {
    throw new InputLoadError(
      `Cannot load input ${source}: duplicate columns ${Array.from(new Set(duplicates)).join(', ')}`,
      source
    )
  }

  const records = dataRows.map(cells => {
    const record: DataRow = {}
    columns.forEach((column, index) => {
      record[column] = normalizeValueCsv(cells[index])
    })
    return record
  })

  return { columns, rows: records }
}

export function parseCsv(filePath: string): Table {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new InputLoadError(`Cannot load input ${filePath}: ${errorMessage(error)}`, filePath)
  }

  // Extract filename from path
  const name = filePath.split(/[/\\]/).pop() || filePath
  return parseCsvText(content, name)
}
