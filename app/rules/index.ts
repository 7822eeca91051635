// Schema rules: per-variant column contracts loaded from configuration

import path from 'node:path'
import * as fs from 'fs'
import { z } from 'zod'
import log from 'electron-log/node'
import { ConfigurationError, errorMessage } from '../errors'
import type { InputDiscovery, SchemaRules, Variant, VariantDefinition } from '../types'

export const DEFAULT_RULES_PATH = path.resolve(__dirname, '../../config/schema-rules.json')

export const VARIANTS: readonly Variant[] = ['commercial', 'non_commercial']

const closedSet = z.array(z.string()).min(1, 'closed set must not be empty')

const rangeSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional()
  })
  .strict()
  .refine(r => r.min === undefined || r.max === undefined || r.min <= r.max, {
    message: 'range min must not exceed max'
  })

export const schemaRulesSchema = z
  .object({
    requiredColumns: z.array(z.string().min(1)).min(1, 'at least one required column'),
    optionalColumns: z.array(z.string().min(1)).default([]),
    columnTypes: z.record(z.string(), z.enum(['integer', 'number', 'string'])).default({}),
    ranges: z.record(z.string(), rangeSchema).default({}),
    categories: z.record(z.string(), closedSet).default({}),
    aggregateMarkers: z.record(z.string(), closedSet).default({}),
    displayColumns: z.array(z.string().min(1)).default([])
  })
  .strict()

const discoverySchema = z
  .object({
    patterns: z.array(z.string().min(1)).min(1),
    fallbackPatterns: z.array(z.string().min(1)).default([]),
    excludeNameFragments: z.array(z.string().min(1)).default([])
  })
  .strict()

const variantDefinitionSchema = schemaRulesSchema.extend({ discovery: discoverySchema }).strict()

const rulesFileSchema = z
  .object({
    commercial: variantDefinitionSchema,
    non_commercial: variantDefinitionSchema
  })
  .strict()

export type SchemaRulesInput = z.input<typeof schemaRulesSchema>

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${where}: ${issue.message}`
  })
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

/**
 * Build the immutable rule set for one variant.
 * Throws ConfigurationError when the definition is incomplete or contradictory.
 */
export function createSchemaRules(variant: Variant, definition: SchemaRulesInput): SchemaRules {
  const parsed = schemaRulesSchema.safeParse(definition)
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new ConfigurationError(`Invalid schema rules for ${variant}: ${issues.join('; ')}`, issues)
  }

  const rules: SchemaRules = {
    variant,
    ...parsed.data
  }
  return deepFreeze(rules)
}

/**
 * Read schema rules and input discovery patterns for both variants
 */
export function loadVariantDefinitions(
  rulesPath: string = DEFAULT_RULES_PATH
): Record<Variant, VariantDefinition> {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(rulesPath, 'utf-8'))
  } catch (error) {
    throw new ConfigurationError(`Cannot read schema rules from ${rulesPath}: ${errorMessage(error)}`)
  }

  const parsed = rulesFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new ConfigurationError(`Invalid schema rules file ${rulesPath}: ${issues.join('; ')}`, issues)
  }

  log.info(`Loaded schema rules from ${rulesPath}`)

  const toDefinition = (variant: Variant): VariantDefinition => {
    const { discovery, ...rules } = parsed.data[variant]
    const frozenDiscovery: InputDiscovery = deepFreeze(discovery)
    return {
      rules: createSchemaRules(variant, rules),
      discovery: frozenDiscovery
    }
  }

  return {
    commercial: toDefinition('commercial'),
    non_commercial: toDefinition('non_commercial')
  }
}

/**
 * Columns whose values mark a rollup row, paired with the marker values
 */
export function aggregateMarkerEntries(rules: SchemaRules): Array<[string, ReadonlySet<string>]> {
  return Object.entries(rules.aggregateMarkers).map(([column, markers]) => [column, new Set(markers)])
}
