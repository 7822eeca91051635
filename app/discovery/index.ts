// Input file discovery

import path from 'node:path'
import * as fs from 'fs'
import log from 'electron-log/node'
import { InputLoadError, errorMessage } from '../errors'
import type { InputDiscovery } from '../types'

/**
 * Translate a filename pattern with `*` and `?` wildcards into an anchored regex
 */
export function patternToRegex(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(char => {
      if (char === '*') return '.*'
      if (char === '?') return '.'
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&')
    })
    .join('')
  return new RegExp(`^${source}$`)
}

function matching(files: string[], patterns: readonly string[], exclude: readonly string[]): string[] {
  const regexes = patterns.map(patternToRegex)
  return files.filter(
    file => regexes.some(re => re.test(file)) && !exclude.some(fragment => file.includes(fragment))
  )
}

/**
 * Pick the input file for a variant: the first primary-pattern match by name,
 * otherwise the first fallback match.
 */
export function findInputFile(inputDir: string, discovery: InputDiscovery): string {
  let files: string[]
  try {
    files = fs
      .readdirSync(inputDir, { withFileTypes: true })
      .filter(entry => entry.isFile())
      .map(entry => entry.name)
      .sort()
  } catch (error) {
    throw new InputLoadError(`Input directory not readable: ${inputDir}: ${errorMessage(error)}`, inputDir)
  }

  const primary = matching(files, discovery.patterns, discovery.excludeNameFragments)
  const candidates = primary.length > 0
    ? primary
    : matching(files, discovery.fallbackPatterns, discovery.excludeNameFragments)

  const [first] = candidates
  if (!first) {
    throw new InputLoadError(
      `No file matching ${[...discovery.patterns, ...discovery.fallbackPatterns].join(', ')} in ${inputDir}`,
      inputDir
    )
  }

  if (candidates.length > 1) {
    log.warn(`Several input candidates in ${inputDir}; using ${first}`)
  }

  return path.join(inputDir, first)
}
