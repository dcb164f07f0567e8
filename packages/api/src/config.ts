// ---------------------------------------------------------------------------
// Runtime configuration
//
// Parsed from process.env once, on first use. DATABASE_URL is only required
// when a connection is actually opened (see db.ts), so the app and its tests
// can load without one.
// ---------------------------------------------------------------------------

import { z } from 'zod'

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  /** Overrides starting within this many days end the owner's current one. */
  OVERRIDE_AUTO_CLOSE_DAYS: z.coerce.number().int().min(0).default(7),
})

export type Config = z.infer<typeof ConfigSchema>

let cached: Config | null = null

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`)
  }
  return parsed.data
}

export function getConfig(): Config {
  if (!cached) cached = loadConfig()
  return cached
}
