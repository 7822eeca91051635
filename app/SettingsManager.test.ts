import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import path from 'node:path'
import { DEFAULT_SETTINGS, SettingsManager, parseSettings } from './SettingsManager'
import { ConfigurationError } from './errors'

describe('SettingsManager', () => {
  let dir: string
  let settingsPath: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'))
    settingsPath = path.join(dir, 'fisheries-ev.config.json')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should use defaults without a settings file', () => {
    expect(new SettingsManager().getSettings()).toEqual(DEFAULT_SETTINGS)
    expect(new SettingsManager(settingsPath).getSettings()).toEqual(DEFAULT_SETTINGS)
  })

  it('should document removeAggregates=true and removeDisplay=false as defaults', () => {
    expect(DEFAULT_SETTINGS.removeAggregates).toBe(true)
    expect(DEFAULT_SETTINGS.removeDisplay).toBe(false)
  })

  it('should merge a partial file over defaults', () => {
    fs.writeFileSync(settingsPath, JSON.stringify({ removeDisplay: true, inputDir: 'in' }), 'utf-8')

    const settings = new SettingsManager(settingsPath).getSettings()

    expect(settings).toEqual({ ...DEFAULT_SETTINGS, removeDisplay: true, inputDir: 'in' })
  })

  it('should reject an unrecognized switch value', () => {
    fs.writeFileSync(settingsPath, JSON.stringify({ removeAggregates: 'sometimes' }), 'utf-8')

    expect(() => new SettingsManager(settingsPath)).toThrow(ConfigurationError)
  })

  it('should reject unknown keys', () => {
    fs.writeFileSync(settingsPath, JSON.stringify({ removeAggregate: false }), 'utf-8')

    expect(() => new SettingsManager(settingsPath)).toThrow(/removeAggregate/)
  })

  it('should ignore undefined overrides', () => {
    const manager = new SettingsManager()
    manager.updateSettings({ outputDir: 'out', removeDisplay: undefined })

    expect(manager.getSettings()).toEqual({ ...DEFAULT_SETTINGS, outputDir: 'out' })
  })

  it('should round-trip saved settings', () => {
    const manager = new SettingsManager(settingsPath)
    manager.updateSettings({ rejectionPolicy: 'reject' })
    manager.saveSettings()

    expect(new SettingsManager(settingsPath).getSettings().rejectionPolicy).toBe('reject')
  })

  it('should refuse to save without a path', () => {
    expect(() => new SettingsManager().saveSettings()).toThrow(ConfigurationError)
  })
})

describe('parseSettings', () => {
  it('should reject an unknown rejection policy', () => {
    expect(() => parseSettings({ ...DEFAULT_SETTINGS, rejectionPolicy: 'drop' })).toThrow(
      'Invalid settings: rejectionPolicy'
    )
  })
})
