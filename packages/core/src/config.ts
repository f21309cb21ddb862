import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DateTime } from 'luxon'
import { errorMessage } from './errors.js'

const DEFAULT_TIMEZONE = 'Asia/Singapore'
const DEFAULT_MODEL = 'claude-haiku-4-5-20251001'
const APP_DIRNAME = '.chatcal'
const CONFIG_FILENAME = 'config.yaml'

export interface AppConfig {
  appDir: string
  timezone: string
  conflicts: { defaultDurationMinutes: number }
  context: { ttlMinutes: number | null }
  extractor: { model: string; timeoutMs: number }
  research: { model: string; timeoutMs: number; maxEvents: number; enrichEvents: boolean }
  store: { timeoutMs: number; dbPath: string }
  briefing: { enabled: boolean; hour: number; minute: number }
  server: { port: number; host: string }
  telegram: { botToken: string | null; apiBaseUrl: string }
}

const timezoneSchema = z
  .string()
  .refine((zone) => DateTime.local().setZone(zone).isValid, 'unknown IANA timezone')

const yamlConfigSchema = z.object({
  timezone: timezoneSchema.default(DEFAULT_TIMEZONE),
  conflicts: z
    .object({ defaultDurationMinutes: z.number().int().positive().default(60) })
    .default({}),
  context: z.object({ ttlMinutes: z.number().positive().nullable().default(null) }).default({}),
  extractor: z
    .object({
      model: z.string().min(1).default(DEFAULT_MODEL),
      timeoutMs: z.number().int().positive().default(20_000),
    })
    .default({}),
  research: z
    .object({
      model: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().default(60_000),
      maxEvents: z.number().int().positive().default(20),
      enrichEvents: z.boolean().default(false),
    })
    .default({}),
  store: z
    .object({
      timeoutMs: z.number().int().positive().default(5_000),
      dbPath: z.string().min(1).default('events.db'),
    })
    .default({}),
  briefing: z
    .object({
      enabled: z.boolean().default(true),
      hour: z.number().int().min(0).max(23).default(21),
      minute: z.number().int().min(0).max(59).default(0),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().positive().default(3000),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),
  telegram: z
    .object({ apiBaseUrl: z.string().url().default('https://api.telegram.org') })
    .default({}),
})

export type YamlConfig = z.infer<typeof yamlConfigSchema>

export function findAppDir(): string {
  // Walk up from cwd looking for an existing .chatcal/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, APP_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found: default to the project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, APP_DIRNAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(APP_DIRNAME)
}

function readYaml(appDir: string): unknown {
  const configPath = path.join(appDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    const parsed: unknown = parse(readFileSync(configPath, 'utf-8'))
    return parsed ?? {}
  } catch (err) {
    console.warn(`Warning: Could not parse ${configPath}: ${errorMessage(err)}. Using defaults.`)
    return {}
  }
}

function parseYamlConfig(raw: unknown, appDir: string): YamlConfig {
  const result = yamlConfigSchema.safeParse(raw)
  if (result.success) return result.data

  const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
  console.warn(`Warning: Invalid ${path.join(appDir, CONFIG_FILENAME)} (${issues}). Using defaults.`)
  return yamlConfigSchema.parse({})
}

function envPort(value: string | undefined): number | undefined {
  if (!value) return undefined
  const port = Number.parseInt(value, 10)
  return Number.isInteger(port) && port > 0 ? port : undefined
}

/**
 * Load configuration from `<appDir>/config.yaml` with environment overrides.
 * `env` defaults to process.env.
 */
export function loadConfig(
  appDir?: string,
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const dir = appDir ?? env.CHATCAL_DIR ?? findAppDir()
  const yaml = parseYamlConfig(readYaml(dir), dir)

  let timezone = yaml.timezone
  if (env.CHATCAL_TIMEZONE) {
    if (timezoneSchema.safeParse(env.CHATCAL_TIMEZONE).success) {
      timezone = env.CHATCAL_TIMEZONE
    } else {
      console.warn(`Warning: Ignoring unknown CHATCAL_TIMEZONE "${env.CHATCAL_TIMEZONE}"`)
    }
  }

  return {
    appDir: dir,
    timezone,
    conflicts: yaml.conflicts,
    context: yaml.context,
    extractor: {
      model: env.CHATCAL_MODEL ?? yaml.extractor.model,
      timeoutMs: yaml.extractor.timeoutMs,
    },
    research: {
      // Falls back to the extractor's model, env override included
      model: yaml.research.model ?? env.CHATCAL_MODEL ?? yaml.extractor.model,
      timeoutMs: yaml.research.timeoutMs,
      maxEvents: yaml.research.maxEvents,
      enrichEvents: yaml.research.enrichEvents,
    },
    store: {
      timeoutMs: yaml.store.timeoutMs,
      dbPath: path.resolve(dir, yaml.store.dbPath),
    },
    briefing: yaml.briefing,
    server: {
      port: envPort(env.PORT) ?? yaml.server.port,
      host: yaml.server.host,
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN ?? null,
      apiBaseUrl: yaml.telegram.apiBaseUrl,
    },
  }
}
