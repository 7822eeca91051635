// Workflow orchestration and pipeline execution

import path from 'node:path'
import log from 'electron-log/node'
import type {
  CombinedSummary,
  DateRange,
  PipelineConfig,
  PipelineResult,
  RejectionPolicy,
  SchemaRules,
  SummaryRecord,
  Table,
  ValidationReport,
  Variant,
  VariantDefinition,
  VariantResult,
  VariantRunOptions,
  VariantSummary
} from '../types'
import { MissingColumnsError, errorMessage } from '../errors'
import { findInputFile } from '../discovery'
import { parseCsv } from '../parsers'
import { applyTransformRules } from '../transformRules'
import { countWarnings, logValidationReport, rowsWithViolations, validateTable } from '../validation'
import { summarizeTables } from '../summary'
import { writeCsv, writeJson } from '../writers'
import { VARIANTS } from '../rules'

const OUTPUT_NAMES: Record<Variant, string> = {
  commercial: 'commercial',
  non_commercial: 'noncommercial'
}

const VARIANT_LABELS: Record<Variant, string> = {
  commercial: 'COMMERCIAL',
  non_commercial: 'NON-COMMERCIAL'
}

const RULE = '='.repeat(70)

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0')
}

/**
 * Date stamp used in artifact names, e.g. 20240131
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
}

/**
 * Date and time stamp used for log files, e.g. 20240131_094502
 */
export function formatRunStamp(date: Date): string {
  return `${formatDateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
}

export function cleanedFileName(variant: Variant, date: Date): string {
  return `cleaned_${OUTPUT_NAMES[variant]}_${formatDateStamp(date)}.csv`
}

export function diagnosticsFileName(variant: Variant, date: Date): string {
  return `validation_${OUTPUT_NAMES[variant]}_${formatDateStamp(date)}.json`
}

export function summaryFileName(date: Date): string {
  return `cleaning_summary_${formatDateStamp(date)}.json`
}

export interface ProcessOptions {
  removeAggregates: boolean
  removeDisplay: boolean
  rejectionPolicy: RejectionPolicy
}

export interface ProcessedTable {
  report: ValidationReport
  cleaned: Table
  summary: SummaryRecord
}

/**
 * Validate, filter and summarize one loaded table.
 * Throws MissingColumnsError before any filtering when the schema check fails.
 */
export function processTable(table: Table, rules: SchemaRules, options: ProcessOptions): ProcessedTable {
  const report = validateTable(table, rules)
  logValidationReport(report)

  if (report.fatal) {
    throw new MissingColumnsError(report.missingColumns)
  }

  const rejectRows = options.rejectionPolicy === 'reject' ? rowsWithViolations(report) : undefined
  if (rejectRows && rejectRows.size > 0) {
    log.info(`[${rules.variant}] Rejecting ${rejectRows.size} rows with validation warnings`)
  }

  const cleaned = applyTransformRules(table, rules, {
    removeAggregates: options.removeAggregates,
    removeDisplay: options.removeDisplay,
    rejectRows
  })

  if (!options.removeAggregates) {
    log.info(`[${rules.variant}] Skipping aggregate row removal (removeAggregates=false)`)
  }
  if (options.removeDisplay) {
    const dropped = table.columns.filter(column => !cleaned.columns.includes(column))
    log.info(`[${rules.variant}] Removed display columns: ${dropped.length > 0 ? dropped.join(', ') : 'none present'}`)
  }

  const summary = summarizeTables(table, cleaned, rules)
  log.info(`[${rules.variant}] ${summary.rows_removed} of ${summary.raw_row_count} rows removed`)

  return { report, cleaned, summary }
}

/**
 * Run one variant end to end. Data and input failures are returned, not thrown,
 * so the other variant can still run.
 */
export function runVariantPipeline(definition: VariantDefinition, options: VariantRunOptions): VariantResult {
  const { rules } = definition
  const variant = rules.variant
  const now = options.now ?? new Date()
  const timings: Record<string, number> = {}
  let startTime: number
  let report: ValidationReport | undefined

  log.info(RULE)
  log.info(`${VARIANT_LABELS[variant]} FISHERIES DATA CLEANING PIPELINE`)
  log.info(RULE)

  try {
    // Step 1: Source - locate and read input file
    startTime = Date.now()
    const inputFile = findInputFile(options.inputDir, definition.discovery)
    const table = parseCsv(inputFile)
    timings['source'] = Date.now() - startTime
    log.info(`[${variant}] Loaded ${table.rows.length.toLocaleString('en-US')} rows from ${path.basename(inputFile)}`)

    // Step 2: Validate, transform, summarize
    startTime = Date.now()
    const processed = processTable(table, rules, options)
    report = processed.report
    timings['process'] = Date.now() - startTime

    // Step 3: Sink - write output files
    startTime = Date.now()
    const outputFile = path.join(options.outputDir, cleanedFileName(variant, now))
    writeCsv(processed.cleaned, outputFile)
    log.info(`[${variant}] Exported ${processed.cleaned.rows.length.toLocaleString('en-US')} rows to ${outputFile}`)

    let diagnosticsFile: string | undefined
    if (options.writeDiagnostics) {
      diagnosticsFile = path.join(options.outputDir, diagnosticsFileName(variant, now))
      writeJson(processed.report, diagnosticsFile)
      log.info(`[${variant}] Validation diagnostics written to ${diagnosticsFile}`)
    }
    timings['sink'] = Date.now() - startTime
    log.debug(`[${variant}] Step timings (ms): ${Object.entries(timings).map(([step, ms]) => `${step}=${ms}`).join(', ')}`)

    return {
      ok: true,
      variant,
      inputFile,
      outputFile,
      diagnosticsFile,
      report: processed.report,
      summary: { ...processed.summary, processing_timestamp: now.toISOString() },
      timings
    }
  } catch (error) {
    log.error(`[${variant}] Data cleaning failed: ${errorMessage(error)}`)
    return {
      ok: false,
      variant,
      error: errorMessage(error),
      missingColumns: error instanceof MissingColumnsError ? [...error.missingColumns] : undefined,
      report
    }
  }
}

function mergeDateRanges(ranges: DateRange[]): DateRange {
  const mins = ranges.map(r => r.min_year).filter((y): y is number => y !== null)
  const maxes = ranges.map(r => r.max_year).filter((y): y is number => y !== null)
  return {
    min_year: mins.length > 0 ? Math.min(...mins) : null,
    max_year: maxes.length > 0 ? Math.max(...maxes) : null
  }
}

/**
 * Merge per-variant summaries; failed variants appear as null
 */
export function buildCombinedSummary(
  results: Record<Variant, VariantResult>,
  timestamp: string
): CombinedSummary {
  const summaryOf = (result: VariantResult): VariantSummary | null => (result.ok ? result.summary : null)

  const commercial = summaryOf(results.commercial)
  const nonCommercial = summaryOf(results.non_commercial)

  const combined: CombinedSummary = {
    pipeline_timestamp: timestamp,
    commercial,
    non_commercial: nonCommercial
  }

  if (commercial && nonCommercial) {
    combined.overall = {
      total_records: commercial.cleaned_row_count + nonCommercial.cleaned_row_count,
      total_exchange_value: commercial.total_exchange_value + nonCommercial.total_exchange_value,
      combined_date_range: mergeDateRanges([commercial.date_range, nonCommercial.date_range])
    }
  }

  return combined
}

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' })

/**
 * Human-readable final report written to the log
 */
export function logPipelineReport(results: Record<Variant, VariantResult>): void {
  log.info('')
  log.info(RULE)
  log.info('FISHERIES DATA CLEANING PIPELINE - FINAL REPORT')
  log.info(RULE)

  for (const variant of VARIANTS) {
    const result = results[variant]
    log.info('')
    if (!result.ok) {
      log.info(`${VARIANT_LABELS[variant]} FISHERIES: FAILED (${result.error})`)
      continue
    }

    const s = result.summary
    const range = s.date_range.min_year === null ? 'n/a' : `${s.date_range.min_year}-${s.date_range.max_year}`
    log.info(`${VARIANT_LABELS[variant]} FISHERIES:`)
    log.info('  Status:      SUCCESS')
    log.info(`  Input Rows:  ${s.raw_row_count.toLocaleString('en-US')}`)
    log.info(`  Output Rows: ${s.cleaned_row_count.toLocaleString('en-US')}`)
    log.info(`  Removed:     ${s.rows_removed.toLocaleString('en-US')}`)
    log.info(`  Warnings:    ${countWarnings(result.report).toLocaleString('en-US')}`)
    log.info(`  Date Range:  ${range}`)
    log.info(`  Total Value: ${currency.format(s.total_exchange_value)}`)
    log.info(`  Counties:    ${s.unique_counties.length}`)
    log.info(`  Species:     ${s.unique_species_groups.length}`)
    if (s.unique_area_ids) log.info(`  DAR Areas:   ${s.unique_area_ids.length}`)
    if (s.unique_islands) log.info(`  Islands:     ${s.unique_islands.length}`)
  }

  log.info('')
  log.info(RULE)
}

/**
 * Run both variants, write the combined summary and report overall status
 */
export function runFullPipeline(config: PipelineConfig): PipelineResult {
  const now = config.now ?? new Date()
  const options: VariantRunOptions = { ...config, now }

  log.info(RULE)
  log.info('FISHERIES DATA CLEANING PIPELINE - START')
  log.info(RULE)
  log.info(`Input Directory:  ${path.resolve(config.inputDir)}`)
  log.info(`Output Directory: ${path.resolve(config.outputDir)}`)
  log.info(`Remove Aggregates: ${config.removeAggregates}`)
  log.info(`Remove Display Columns: ${config.removeDisplay}`)
  log.info(`Rejection Policy: ${config.rejectionPolicy}`)

  const results: Record<Variant, VariantResult> = {
    commercial: runVariantPipeline(config.definitions.commercial, options),
    non_commercial: runVariantPipeline(config.definitions.non_commercial, options)
  }

  const summary = buildCombinedSummary(results, now.toISOString())

  let summaryFile: string | null = null
  if (results.commercial.ok || results.non_commercial.ok) {
    summaryFile = path.join(config.outputDir, summaryFileName(now))
    writeJson(summary, summaryFile)
    log.info(`Summary exported to ${summaryFile}`)
  } else {
    log.error('No variant succeeded; summary not written')
  }

  logPipelineReport(results)

  const ok = results.commercial.ok && results.non_commercial.ok
  log.info(ok ? 'PIPELINE STATUS: SUCCESS' : 'PIPELINE STATUS: PARTIAL SUCCESS OR FAILURE')

  return { ok, results, summary, summaryFile }
}
