export * from './types'
export { ConfigurationError, InputLoadError, MissingColumnsError } from './errors'
export { createSchemaRules, loadVariantDefinitions, DEFAULT_RULES_PATH, VARIANTS } from './rules'
export { validateTable, rowsWithViolations, countWarnings } from './validation'
export {
  applyTransformRules,
  aggregateRowMatcher,
  isAggregateRow,
  removeAggregateRows,
  removeDisplayColumns,
  DEFAULT_TRANSFORM_OPTIONS
} from './transformRules'
export { summarizeTables } from './summary'
export { parseCsv, parseCsvText } from './parsers'
export { writeCsv, formatCsv } from './writers'
export { findInputFile } from './discovery'
export { processTable, runVariantPipeline, runFullPipeline, buildCombinedSummary } from './workflow'
export { SettingsManager, DEFAULT_SETTINGS } from './SettingsManager'
