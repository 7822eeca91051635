// Data validation

import log from 'electron-log/node'
import type {
  CheckName,
  CheckResult,
  ColumnType,
  NumericRange,
  SchemaRules,
  Table,
  ValidationError,
  ValidationReport
} from '../types'
import { cellText, parseInteger, parseNumber } from '../utils/values'

function parseAs(type: ColumnType, value: unknown): number | null {
  return type === 'integer' ? parseInteger(value) : parseNumber(value)
}

function describeRange(range: NumericRange): string {
  if (range.min !== undefined && range.max !== undefined) {
    return `outside ${range.min}-${range.max}`
  }
  if (range.min !== undefined) {
    return `below ${range.min}`
  }
  return `above ${range.max}`
}

function buildCheck(check: CheckName, violations: ValidationError[]): CheckResult {
  const unexpected = new Map<string, Set<string>>()
  for (const violation of violations) {
    const values = unexpected.get(violation.field) ?? new Set<string>()
    values.add(cellText(violation.value))
    unexpected.set(violation.field, values)
  }

  const unexpectedValues: Record<string, string[]> = {}
  for (const [field, values] of unexpected) {
    unexpectedValues[field] = Array.from(values).sort()
  }

  return {
    check,
    passed: violations.length === 0,
    severity: 'warning',
    violations,
    unexpectedValues
  }
}

export function checkColumnPresence(table: Table, rules: SchemaRules): CheckResult {
  const present = new Set(table.columns)
  const missing = rules.requiredColumns.filter(column => !present.has(column))

  return {
    check: 'column_presence',
    passed: missing.length === 0,
    severity: 'fatal',
    violations: missing.map(column => ({
      row: -1,
      field: column,
      value: null,
      message: `Missing required column: ${column}`
    })),
    unexpectedValues: {}
  }
}

export function checkTypes(table: Table, rules: SchemaRules): CheckResult {
  const violations: ValidationError[] = []
  const typed = Object.entries(rules.columnTypes).filter(
    ([column, type]) => type !== 'string' && table.columns.includes(column)
  )

  table.rows.forEach((row, index) => {
    for (const [column, type] of typed) {
      const value = row[column]
      if (parseAs(type, value) === null) {
        violations.push({
          row: index,
          field: column,
          value,
          message: `Expected ${type} in ${column}, got "${cellText(value)}"`
        })
      }
    }
  })

  return buildCheck('type_conformance', violations)
}

export function checkRanges(table: Table, rules: SchemaRules): CheckResult {
  const violations: ValidationError[] = []
  const ranged = Object.entries(rules.ranges).filter(([column]) => table.columns.includes(column))

  table.rows.forEach((row, index) => {
    for (const [column, range] of ranged) {
      const value = row[column]
      // Unparseable values are reported by the type check
      const parsed = parseAs(rules.columnTypes[column] ?? 'number', value)
      if (parsed === null) {
        continue
      }
      const tooLow = range.min !== undefined && parsed < range.min
      const tooHigh = range.max !== undefined && parsed > range.max
      if (tooLow || tooHigh) {
        violations.push({
          row: index,
          field: column,
          value,
          message: `${column} ${parsed} ${describeRange(range)}`
        })
      }
    }
  })

  return buildCheck('range_conformance', violations)
}

export function checkCategories(table: Table, rules: SchemaRules): CheckResult {
  const violations: ValidationError[] = []
  const categorical = Object.entries(rules.categories)
    .filter(([column]) => table.columns.includes(column))
    .map(([column, allowed]) => [column, new Set(allowed)] as const)

  table.rows.forEach((row, index) => {
    for (const [column, allowed] of categorical) {
      const value = row[column]
      if (!allowed.has(cellText(value))) {
        violations.push({
          row: index,
          field: column,
          value,
          message: `Unexpected ${column} "${cellText(value)}"`
        })
      }
    }
  })

  return buildCheck('categorical_conformance', violations)
}

/**
 * Validate a loaded table against one variant's rules.
 * Only a missing required column is fatal; in that case no other check runs.
 */
export function validateTable(table: Table, rules: SchemaRules): ValidationReport {
  const presence = checkColumnPresence(table, rules)
  const missingColumns = presence.violations.map(v => v.field)
  const optionalColumnsPresent = rules.optionalColumns.filter(column => table.columns.includes(column))

  const base = {
    variant: rules.variant,
    rowCount: table.rows.length,
    missingColumns,
    optionalColumnsPresent
  }

  if (!presence.passed) {
    return { ...base, fatal: true, checks: [presence] }
  }

  return {
    ...base,
    fatal: false,
    checks: [
      presence,
      checkTypes(table, rules),
      checkRanges(table, rules),
      checkCategories(table, rules)
    ]
  }
}

/**
 * Row indices carrying at least one warning-level violation
 */
export function rowsWithViolations(report: ValidationReport): Set<number> {
  const rows = new Set<number>()
  for (const check of report.checks) {
    if (check.severity !== 'warning') continue
    for (const violation of check.violations) {
      rows.add(violation.row)
    }
  }
  return rows
}

export function countWarnings(report: ValidationReport): number {
  return report.checks
    .filter(check => check.severity === 'warning')
    .reduce((total, check) => total + check.violations.length, 0)
}

const CHECK_LABELS: Record<CheckName, string> = {
  column_presence: 'Schema',
  type_conformance: 'Data type',
  range_conformance: 'Data range',
  categorical_conformance: 'Category'
}

/**
 * Write a validation report to the log sink
 */
export function logValidationReport(report: ValidationReport): void {
  if (report.fatal) {
    log.error(`[${report.variant}] Missing required columns: ${report.missingColumns.join(', ')}`)
    return
  }

  if (report.optionalColumnsPresent.length > 0) {
    log.info(`[${report.variant}] Optional columns present: ${report.optionalColumnsPresent.join(', ')}`)
  }

  for (const check of report.checks) {
    const label = CHECK_LABELS[check.check]
    if (check.passed) {
      log.info(`[${report.variant}] ${label} validation passed`)
      continue
    }
    for (const [field, values] of Object.entries(check.unexpectedValues)) {
      const count = check.violations.filter(v => v.field === field).length
      log.warn(`[${report.variant}] ${label} issue in ${field}: ${count} rows, values ${JSON.stringify(values)}`)
    }
  }
}
