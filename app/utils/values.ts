// Cell value parsing shared by validation and summaries

const INTEGER_PATTERN = /^[+-]?\d+(\.0*)?$/
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Render a cell as trimmed text; null and undefined become ''
 */
export function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }
  return String(value).trim()
}

export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null
  }
  const text = cellText(value)
  if (!INTEGER_PATTERN.test(text)) {
    return null
  }
  const parsed = Number(text)
  return Number.isSafeInteger(parsed) ? parsed : null
}

export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  const text = cellText(value)
  if (!NUMBER_PATTERN.test(text)) {
    return null
  }
  const parsed = Number(text)
  return Number.isFinite(parsed) ? parsed : null
}
