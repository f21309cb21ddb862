import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { loadConfig } from '../src/config.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function writeConfig(dir: string, content: string): void {
  fs.writeFileSync(path.join(dir, 'config.yaml'), content, 'utf-8')
}

describe('loadConfig', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatcal-config-'))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('uses defaults when there is no config file', () => {
    const config = loadConfig(tempDir, {})

    expect(config.appDir).toBe(tempDir)
    expect(config.timezone).toBe('Asia/Singapore')
    expect(config.conflicts.defaultDurationMinutes).toBe(60)
    expect(config.context.ttlMinutes).toBeNull()
    expect(config.extractor.timeoutMs).toBe(20_000)
    expect(config.store).toEqual({ timeoutMs: 5_000, dbPath: path.join(tempDir, 'events.db') })
    expect(config.briefing).toEqual({ enabled: true, hour: 21, minute: 0 })
    expect(config.server.port).toBe(3000)
    expect(config.telegram).toEqual({ botToken: null, apiBaseUrl: 'https://api.telegram.org' })
    expect(config.research).toEqual({
      model: 'claude-haiku-4-5-20251001',
      timeoutMs: 60_000,
      maxEvents: 20,
      enrichEvents: false,
    })
  })

  it('reads the research section and falls back to the extractor model', () => {
    writeConfig(
      tempDir,
      ['extractor:', '  model: extractor-model', 'research:', '  enrichEvents: true', '  maxEvents: 5'].join('\n'),
    )

    const config = loadConfig(tempDir, {})

    expect(config.research).toEqual({
      model: 'extractor-model',
      timeoutMs: 60_000,
      maxEvents: 5,
      enrichEvents: true,
    })
  })

  it('keeps an explicit research model over the environment', () => {
    writeConfig(tempDir, ['research:', '  model: research-model'].join('\n'))

    const config = loadConfig(tempDir, { CHATCAL_MODEL: 'test-model' })

    expect(config.extractor.model).toBe('test-model')
    expect(config.research.model).toBe('research-model')
  })

  it('reads values from config.yaml', () => {
    writeConfig(
      tempDir,
      [
        'timezone: Europe/London',
        'conflicts:',
        '  defaultDurationMinutes: 30',
        'context:',
        '  ttlMinutes: 120',
        'briefing:',
        '  hour: 20',
        'store:',
        '  dbPath: data/calendar.db',
      ].join('\n'),
    )

    const config = loadConfig(tempDir, {})

    expect(config.timezone).toBe('Europe/London')
    expect(config.conflicts.defaultDurationMinutes).toBe(30)
    expect(config.context.ttlMinutes).toBe(120)
    expect(config.briefing).toEqual({ enabled: true, hour: 20, minute: 0 })
    expect(config.store.dbPath).toBe(path.join(tempDir, 'data', 'calendar.db'))
  })

  it('applies environment overrides', () => {
    writeConfig(tempDir, 'timezone: Europe/London\n')

    const config = loadConfig(tempDir, {
      CHATCAL_TIMEZONE: 'America/New_York',
      CHATCAL_MODEL: 'test-model',
      PORT: '8080',
      TELEGRAM_BOT_TOKEN: 'test-token',
    })

    expect(config.timezone).toBe('America/New_York')
    expect(config.extractor.model).toBe('test-model')
    expect(config.server.port).toBe(8080)
    expect(config.telegram.botToken).toBe('test-token')
  })

  it('ignores an unknown timezone override', () => {
    const config = loadConfig(tempDir, { CHATCAL_TIMEZONE: 'Mars/Olympus_Mons' })
    expect(config.timezone).toBe('Asia/Singapore')
  })

  it('falls back to defaults when the file is invalid', () => {
    writeConfig(tempDir, 'timezone: Mars/Olympus_Mons\nconflicts:\n  defaultDurationMinutes: 30\n')

    const config = loadConfig(tempDir, {})

    expect(config.timezone).toBe('Asia/Singapore')
    expect(config.conflicts.defaultDurationMinutes).toBe(60)
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('falls back to defaults when the file is not YAML', () => {
    writeConfig(tempDir, 'timezone: [unclosed\n')
    expect(loadConfig(tempDir, {}).timezone).toBe('Asia/Singapore')
  })

  it('finds the app dir through CHATCAL_DIR', () => {
    writeConfig(tempDir, 'timezone: Asia/Tokyo\n')
    const config = loadConfig(undefined, { CHATCAL_DIR: tempDir })
    expect(config.appDir).toBe(tempDir)
    expect(config.timezone).toBe('Asia/Tokyo')
  })
})
