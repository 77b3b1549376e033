/**
 * CLI configuration. The database path comes from `--database`, then
 * OFFLINE_KB_DATABASE, then a per-user default under ~/.local/share.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { Ok, Err, KnowledgeBaseError, MAX_HASH_ITERATIONS } from '@offline-kb/core'
import type { Result } from '@offline-kb/core'

const EnvSchema = z.object({
  OFFLINE_KB_DATABASE: z.string().trim().min(1).optional(),
  OFFLINE_KB_HASH_ITERATIONS: z.coerce.number().int().positive().max(MAX_HASH_ITERATIONS).optional(),
})

export interface CliConfig {
  databasePath: string
  hashIterations?: number
}

export interface ResolveConfigInput {
  databaseFlag?: string
  env: Record<string, string | undefined>
  homeDir?: string
}

export function defaultDatabasePath(homeDir: string = homedir()): string {
  return join(homeDir, '.local', 'share', 'offline-kb', 'knowledge.db')
}

export function resolveConfig(input: ResolveConfigInput): Result<CliConfig, KnowledgeBaseError> {
  const env = EnvSchema.safeParse(input.env)
  if (!env.success) {
    return Err(KnowledgeBaseError.fromZod(env.error))
  }

  const flag = input.databaseFlag?.trim()
  if (input.databaseFlag !== undefined && !flag) {
    return Err(KnowledgeBaseError.validation('--database needs a path'))
  }

  return Ok({
    databasePath: flag || env.data.OFFLINE_KB_DATABASE || defaultDatabasePath(input.homeDir),
    ...(env.data.OFFLINE_KB_HASH_ITERATIONS !== undefined
      ? { hashIterations: env.data.OFFLINE_KB_HASH_ITERATIONS }
      : {}),
  })
}
