import type { DataRow, SchemaRules, Table, TransformOptions } from './types'
import { aggregateMarkerEntries } from './rules'
import { cellText } from './utils/values'

// =============================================================================
// TRANSFORMATION RULES
// =============================================================================

export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = {
  removeAggregates: true,
  removeDisplay: false
}

/**
 * A row is an aggregate when any marker column holds one of its rollup values.
 * Other columns play no part in the decision.
 */
export function isAggregateRow(row: DataRow, rules: SchemaRules): boolean {
  return aggregateRowMatcher(rules)(row)
}

/**
 * Build the marker lookup once for a whole table
 */
export function aggregateRowMatcher(rules: SchemaRules): (row: DataRow) => boolean {
  const entries = aggregateMarkerEntries(rules)
  return row => entries.some(([column, markers]) => markers.has(cellText(row[column])))
}

export function removeAggregateRows(table: Table, rules: SchemaRules): Table {
  const isAggregate = aggregateRowMatcher(rules)
  return {
    columns: [...table.columns],
    rows: table.rows.filter(row => !isAggregate(row))
  }
}

export function removeDisplayColumns(table: Table, rules: SchemaRules): Table {
  const dropped = new Set(rules.displayColumns)
  const columns = table.columns.filter(column => !dropped.has(column))

  return {
    columns,
    rows: table.rows.map(row => {
      const outputRow: DataRow = {}
      for (const [key, value] of Object.entries(row)) {
        if (!dropped.has(key)) {
          outputRow[key] = value
        }
      }
      return outputRow
    })
  }
}

export function removeRejectedRows(table: Table, rejectRows: ReadonlySet<number>): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.filter((_row, index) => !rejectRows.has(index))
  }
}

/**
 * Derive the cleaned table. Only deletes rows and columns; the input table
 * and its rows are left untouched.
 */
export function applyTransformRules(table: Table, rules: SchemaRules, options: TransformOptions): Table {
  // Row indices refer to the loaded table, so rejection runs first
  let result: Table = options.rejectRows && options.rejectRows.size > 0
    ? removeRejectedRows(table, options.rejectRows)
    : { columns: [...table.columns], rows: [...table.rows] }

  if (options.removeAggregates) {
    result = removeAggregateRows(result, rules)
  }

  if (options.removeDisplay) {
    result = removeDisplayColumns(result, rules)
  }

  return result
}
