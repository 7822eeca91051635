// File writers for cleaned CSV and JSON artifacts

import path from 'node:path'
import * as fs from 'fs'
import type { Table } from '../types'

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }

  const str = String(value)

  // If contains comma, quote, or line break, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Serialize a table as CSV text in its column order
 */
export function formatCsv(table: Table): string {
  const lines: string[] = []

  lines.push(table.columns.map(h => escapeCsvValue(h)).join(','))

  for (const row of table.rows) {
    lines.push(table.columns.map(h => escapeCsvValue(row[h])).join(','))
  }

  return lines.join('\n') + '\n'
}

/**
 * Write table to CSV file. A table without rows still gets its header line.
 */
export function writeCsv(table: Table, outputPath: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  fs.writeFileSync(outputPath, formatCsv(table), 'utf-8')
}

export function writeJson(data: unknown, outputPath: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  fs.writeFileSync(outputPath, JSON.stringify(data, null, 2) + '\n', 'utf-8')
}
