/**
 * Engine Configuration Loader
 *
 * Loads engine tuning from config.yaml in a tzcal directory: an explicit
 * directory, then $TZCAL_DIR, then the nearest .tzcal/ walking up from cwd.
 * A missing file means defaults; an unreadable or invalid one logs a
 * warning and also falls back to defaults.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'

const CONFIG_DIRNAME = '.tzcal'
const CONFIG_FILENAME = 'config.yaml'

// ─────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────

const OccurrencesSchema = z.object({
  maxPerEvent: z.number().int().nonnegative().default(1000),
})

const AnalysisSchema = z.object({
  activeOnly: z.boolean().default(true),
  busyThresholdPercent: z.number().min(0).max(100).default(60),
  lightThresholdPercent: z.number().min(0).max(100).default(30),
  suggestionStepMinutes: z.number().int().positive().default(60),
  slotLookbackHours: z.number().nonnegative().default(24),
})

export const EngineConfigSchema = z.object({
  occurrences: OccurrencesSchema.default({}),
  analysis: AnalysisSchema.default({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type AnalysisConfig = EngineConfig['analysis']

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({})

// ─────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────

/**
 * Walk up from `from` looking for an existing .tzcal/ directory.
 */
export function findConfigDir(from: string = process.cwd()): string | undefined {
  let dir = path.resolve(from)
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return undefined
}

function readYaml(configPath: string): unknown {
  try {
    return parse(readFileSync(configPath, 'utf-8')) ?? {}
  } catch (err) {
    console.warn(
      `[tzcal:config] Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return undefined
  }
}

/**
 * Load engine configuration, merged over the defaults.
 */
export function loadEngineConfig(configDir?: string): EngineConfig {
  const dir = configDir ?? process.env.TZCAL_DIR ?? findConfigDir()
  if (!dir) return DEFAULT_ENGINE_CONFIG

  const configPath = path.join(dir, CONFIG_FILENAME)
  if (!existsSync(configPath)) return DEFAULT_ENGINE_CONFIG

  const raw = readYaml(configPath)
  if (raw === undefined) return DEFAULT_ENGINE_CONFIG

  const parsed = EngineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    console.warn(`[tzcal:config] Warning: Invalid ${configPath} (${issues}). Using defaults.`)
    return DEFAULT_ENGINE_CONFIG
  }
  return parsed.data
}
