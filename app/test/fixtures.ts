import { loadVariantDefinitions } from '../rules'
import type { DataRow, Table } from '../types'

export const definitions = loadVariantDefinitions()
export const commercialRules = definitions.commercial.rules
export const nonCommercialRules = definitions.non_commercial.rules

export const COMMERCIAL_COLUMNS = [
  'year',
  'area_id',
  'county',
  'county_olelo',
  'species_group',
  'ecosystem_type',
  'exchange_value',
  'exchange_value_formatted'
]

export const NON_COMMERCIAL_COLUMNS = [
  'year',
  'island',
  'island_olelo',
  'county',
  'county_olelo',
  'species_group',
  'ecosystem_type',
  'exchange_value',
  'exchange_value_formatted'
]

export function commercialRow(overrides: DataRow = {}): DataRow {
  return {
    year: '2021',
    area_id: '16',
    county: 'Honolulu',
    county_olelo: 'Honolulu',
    species_group: 'Deep 7 Bottomfish',
    ecosystem_type: 'Inshore — Reef',
    exchange_value: '10289',
    exchange_value_formatted: '$10,289',
    ...overrides
  }
}

export function nonCommercialRow(overrides: DataRow = {}): DataRow {
  return {
    year: '2010',
    island: 'Oahu',
    island_olelo: 'Oʻahu',
    county: 'Honolulu',
    county_olelo: 'Honolulu',
    species_group: 'Herbivores',
    ecosystem_type: 'Inshore — Reef',
    exchange_value: '500',
    exchange_value_formatted: '$500',
    ...overrides
  }
}

export function commercialTable(rows: DataRow[]): Table {
  return { columns: [...COMMERCIAL_COLUMNS], rows }
}

export function nonCommercialTable(rows: DataRow[]): Table {
  return { columns: [...NON_COMMERCIAL_COLUMNS], rows }
}

/**
 * Four rows for one catch area in 2021: two leaf rows, a species subtotal
 * and an all-species rollup
 */
export function areaRollupTable(): Table {
  return commercialTable([
    commercialRow({ area_id: '100', ecosystem_type: 'Inshore — Reef', exchange_value: '10289' }),
    commercialRow({ area_id: '100', ecosystem_type: 'Coastal — Open Ocean', exchange_value: '0', exchange_value_formatted: '$0' }),
    commercialRow({ area_id: '100', ecosystem_type: 'All Ecosystems', exchange_value: '10289' }),
    commercialRow({ area_id: '100', species_group: 'All Species', ecosystem_type: 'All Ecosystems', exchange_value: '10289' })
  ])
}

export function toCsv(columns: string[], rows: string[][]): string {
  return [columns.join(','), ...rows.map(r => r.join(','))].join('\n') + '\n'
}
