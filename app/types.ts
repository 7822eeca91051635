// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

// Settings
export type RejectionPolicy = 'warn' | 'reject'

export interface AppSettings {
  inputDir: string
  outputDir: string
  logDir: string
  removeAggregates: boolean
  removeDisplay: boolean
  rejectionPolicy: RejectionPolicy
  writeDiagnostics: boolean
  rulesPath?: string | undefined
}

// Core data types
export type DataRow = Record<string, unknown>

export interface Table {
  columns: string[]
  rows: DataRow[]
}

export type Variant = 'commercial' | 'non_commercial'

export type ColumnType = 'integer' | 'number' | 'string'

export interface NumericRange {
  min?: number | undefined
  max?: number | undefined
}

/**
 * Immutable per-variant contract: which columns must exist, how they parse,
 * which values they may take, and what the transformer may drop.
 */
export interface SchemaRules {
  readonly variant: Variant
  readonly requiredColumns: readonly string[]
  readonly optionalColumns: readonly string[]
  readonly columnTypes: Readonly<Record<string, ColumnType>>
  readonly ranges: Readonly<Record<string, Readonly<NumericRange>>>
  readonly categories: Readonly<Record<string, readonly string[]>>
  readonly aggregateMarkers: Readonly<Record<string, readonly string[]>>
  readonly displayColumns: readonly string[]
}

export interface InputDiscovery {
  readonly patterns: readonly string[]
  readonly fallbackPatterns: readonly string[]
  readonly excludeNameFragments: readonly string[]
}

export interface VariantDefinition {
  readonly rules: SchemaRules
  readonly discovery: InputDiscovery
}

// Validation
export type CheckName =
  | 'column_presence'
  | 'type_conformance'
  | 'range_conformance'
  | 'categorical_conformance'

export type Severity = 'fatal' | 'warning'

export interface ValidationError {
  row: number
  field: string
  value: unknown
  message: string
}

export interface CheckResult {
  check: CheckName
  passed: boolean
  severity: Severity
  violations: ValidationError[]
  unexpectedValues: Record<string, string[]>
}

export interface ValidationReport {
  variant: Variant
  rowCount: number
  fatal: boolean
  missingColumns: string[]
  optionalColumnsPresent: string[]
  checks: CheckResult[]
}

// Transformation
export interface TransformOptions {
  removeAggregates: boolean
  removeDisplay: boolean
  rejectRows?: ReadonlySet<number> | undefined
}

// Summaries
export interface DateRange {
  min_year: number | null
  max_year: number | null
}

export interface SummaryRecord {
  data_type: Variant
  raw_row_count: number
  cleaned_row_count: number
  rows_removed: number
  date_range: DateRange
  total_exchange_value: number
  unique_counties: string[]
  unique_species_groups: string[]
  unique_ecosystem_types: string[]
  unique_area_ids?: number[]
  unique_islands?: string[]
  records_by_year: Record<string, number>
  total_value_by_year: Record<string, number>
}

export interface VariantSummary extends SummaryRecord {
  processing_timestamp: string
}

export interface CombinedSummary {
  pipeline_timestamp: string
  commercial: VariantSummary | null
  non_commercial: VariantSummary | null
  overall?: {
    total_records: number
    total_exchange_value: number
    combined_date_range: DateRange
  }
}

// Pipeline
export interface VariantRunOptions {
  inputDir: string
  outputDir: string
  removeAggregates: boolean
  removeDisplay: boolean
  rejectionPolicy: RejectionPolicy
  writeDiagnostics: boolean
  now?: Date
}

export type VariantResult =
  | {
      ok: true
      variant: Variant
      inputFile: string
      outputFile: string
      diagnosticsFile?: string | undefined
      report: ValidationReport
      summary: VariantSummary
      timings: Record<string, number>
    }
  | {
      ok: false
      variant: Variant
      error: string
      missingColumns?: string[] | undefined
      report?: ValidationReport | undefined
    }

export interface PipelineConfig extends VariantRunOptions {
  definitions: Readonly<Record<Variant, VariantDefinition>>
}

export interface PipelineResult {
  ok: boolean
  results: Record<Variant, VariantResult>
  summary: CombinedSummary
  summaryFile: string | null
}
