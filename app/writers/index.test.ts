import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import path from 'node:path'
import { escapeCsvValue, formatCsv, writeCsv, writeJson } from './index'

describe('escapeCsvValue', () => {
  it('should leave plain and numeric values unquoted', () => {
    expect(escapeCsvValue('Honolulu')).toBe('Honolulu')
    expect(escapeCsvValue(10289)).toBe('10289')
    expect(escapeCsvValue('0.5')).toBe('0.5')
  })

  it('should quote values with commas, quotes or line breaks', () => {
    expect(escapeCsvValue('$10,289')).toBe('"$10,289"')
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""')
    expect(escapeCsvValue('a\nb')).toBe('"a\nb"')
    expect(escapeCsvValue('a\rb')).toBe('"a\rb"')
  })

  it('should render null and undefined as empty', () => {
    expect(escapeCsvValue(null)).toBe('')
    expect(escapeCsvValue(undefined)).toBe('')
  })
})

describe('formatCsv', () => {
  it('should follow the table column order, not row key order', () => {
    const csv = formatCsv({
      columns: ['year', 'county', 'exchange_value'],
      rows: [{ exchange_value: '5', county: 'Maui', year: '2020' }]
    })

    expect(csv).toBe('year,county,exchange_value\n2020,Maui,5\n')
  })

  it('should write only the header for an empty table', () => {
    expect(formatCsv({ columns: ['year', 'county'], rows: [] })).toBe('year,county\n')
  })
})

describe('file writers', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'writers-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should create missing directories for CSV output', () => {
    const file = path.join(dir, 'nested', 'out.csv')
    writeCsv({ columns: ['a'], rows: [{ a: 'x' }] }, file)

    expect(fs.readFileSync(file, 'utf-8')).toBe('a\nx\n')
  })

  it('should write indented JSON', () => {
    const file = path.join(dir, 'summary.json')
    writeJson({ ok: true }, file)

    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "ok": true\n}\n')
  })
})
