// Summary statistics for raw and cleaned tables

import type { DateRange, SchemaRules, SummaryRecord, Table } from '../types'
import { cellText, parseInteger, parseNumber } from '../utils/values'

function distinctText(table: Table, column: string): string[] {
  const values = new Set<string>()
  for (const row of table.rows) {
    const text = cellText(row[column])
    if (text) values.add(text)
  }
  return Array.from(values).sort()
}

function distinctIntegers(table: Table, column: string): number[] {
  const values = new Set<number>()
  for (const row of table.rows) {
    const parsed = parseInteger(row[column])
    if (parsed !== null) values.add(parsed)
  }
  return Array.from(values).sort((a, b) => a - b)
}

function yearRange(years: number[]): DateRange {
  if (years.length === 0) {
    return { min_year: null, max_year: null }
  }
  return {
    min_year: years.reduce((a, b) => Math.min(a, b)),
    max_year: years.reduce((a, b) => Math.max(a, b))
  }
}

/**
 * Compute the statistics record for one variant from its loaded and cleaned tables
 */
export function summarizeTables(raw: Table, cleaned: Table, rules: SchemaRules): SummaryRecord {
  const years: number[] = []
  const recordsByYear: Record<string, number> = {}
  const valueByYear: Record<string, number> = {}
  let total = 0

  for (const row of cleaned.rows) {
    const year = parseInteger(row['year'])
    const value = parseNumber(row['exchange_value'])

    if (value !== null) {
      total += value
    }
    if (year === null) continue

    years.push(year)
    const key = String(year)
    recordsByYear[key] = (recordsByYear[key] ?? 0) + 1
    valueByYear[key] = (valueByYear[key] ?? 0) + (value ?? 0)
  }

  const summary: SummaryRecord = {
    data_type: rules.variant,
    raw_row_count: raw.rows.length,
    cleaned_row_count: cleaned.rows.length,
    rows_removed: raw.rows.length - cleaned.rows.length,
    date_range: yearRange(years),
    total_exchange_value: total,
    unique_counties: distinctText(cleaned, 'county'),
    unique_species_groups: distinctText(cleaned, 'species_group'),
    unique_ecosystem_types: distinctText(cleaned, 'ecosystem_type'),
    records_by_year: sortByYear(recordsByYear),
    total_value_by_year: sortByYear(valueByYear)
  }

  if (rules.variant === 'commercial') {
    summary.unique_area_ids = distinctIntegers(cleaned, 'area_id')
  } else {
    summary.unique_islands = distinctText(cleaned, 'island')
  }

  return summary
}

function sortByYear(values: Record<string, number>): Record<string, number> {
  const sorted: Record<string, number> = {}
  for (const key of Object.keys(values).sort((a, b) => Number(a) - Number(b))) {
    sorted[key] = values[key] ?? 0
  }
  return sorted
}
