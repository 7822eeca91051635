// Pipeline error types

/**
 * Raised when settings, switches or schema rules are unusable.
 * Surfaces before any dataset is touched.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Raised when an input file cannot be found, read, or parsed into a table
 */
export class InputLoadError extends Error {
  constructor(message: string, public readonly filePath?: string) {
    super(message)
    this.name = 'InputLoadError'
  }
}

/**
 * Raised when a table lacks required columns; halts that variant's pipeline
 */
export class MissingColumnsError extends Error {
  constructor(public readonly missingColumns: readonly string[]) {
    super(`Missing required columns: ${missingColumns.join(', ')}`)
    this.name = 'MissingColumnsError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
