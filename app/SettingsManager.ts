import path from 'node:path'
import * as fs from 'fs'
import { z } from 'zod'
import log from 'electron-log/node'
import type { AppSettings } from './types'
import { ConfigurationError, errorMessage } from './errors'

export const DEFAULT_SETTINGS: AppSettings = {
  inputDir: 'data/raw',
  outputDir: 'data/cleaned',
  logDir: 'logs',
  removeAggregates: true,
  removeDisplay: false,
  rejectionPolicy: 'warn',
  writeDiagnostics: false
}

const settingsSchema = z
  .object({
    inputDir: z.string().min(1),
    outputDir: z.string().min(1),
    logDir: z.string().min(1),
    removeAggregates: z.boolean(),
    removeDisplay: z.boolean(),
    rejectionPolicy: z.enum(['warn', 'reject']),
    writeDiagnostics: z.boolean(),
    rulesPath: z.string().min(1).optional()
  })
  .strict()

/**
 * Check a settings object, throwing ConfigurationError on unknown keys or bad values
 */
export function parseSettings(candidate: unknown, source: string = 'settings'): AppSettings {
  const result = settingsSchema.safeParse(candidate)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, issues)
  }
  return result.data
}

export class SettingsManager {
  private settingsPath: string | null
  private settings: AppSettings

  /**
   * @param settingsPath - JSON settings file; defaults apply when omitted or absent
   */
  constructor(settingsPath?: string) {
    this.settingsPath = settingsPath ? path.resolve(settingsPath) : null
    this.settings = this.loadSettings()
  }

  private loadSettings(): AppSettings {
    if (!this.settingsPath || !fs.existsSync(this.settingsPath)) {
      return { ...DEFAULT_SETTINGS }
    }

    let loaded: unknown
    try {
      loaded = JSON.parse(fs.readFileSync(this.settingsPath, 'utf-8'))
    } catch (error) {
      throw new ConfigurationError(`Failed to load settings from ${this.settingsPath}: ${errorMessage(error)}`)
    }

    if (!loaded || typeof loaded !== 'object' || Array.isArray(loaded)) {
      throw new ConfigurationError(`Settings file ${this.settingsPath} must contain a JSON object`)
    }

    // Merge with defaults to ensure all fields exist
    const settings = parseSettings({ ...DEFAULT_SETTINGS, ...loaded }, this.settingsPath)
    log.info(`Settings loaded from ${this.settingsPath}`)
    return settings
  }

  saveSettings(): void {
    if (!this.settingsPath) {
      throw new ConfigurationError('No settings file path configured')
    }
    try {
      fs.mkdirSync(path.dirname(this.settingsPath), { recursive: true })
      fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2) + '\n', 'utf-8')
    } catch (error) {
      log.error('[ERROR] Failed to save settings:', error)
      throw error
    }
  }

  getSettings(): AppSettings {
    return { ...this.settings }
  }

  /**
   * Apply overrides in memory; call saveSettings to persist them
   */
  updateSettings(updates: Partial<AppSettings>): void {
    const defined = Object.fromEntries(Object.entries(updates).filter(([, value]) => value !== undefined))
    this.settings = parseSettings({ ...this.settings, ...defined }, 'settings update')
  }

  resetSettings(): void {
    this.settings = { ...DEFAULT_SETTINGS }
  }
}
