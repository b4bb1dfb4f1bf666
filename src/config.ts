// Runtime configuration read from MAILQUERY_* environment variables.
// Parsed once with zod; a bad value surfaces as a ValidationError naming the
// variable instead of NaN leaking into batch sizes or delays.

import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ValidationError } from './api-utils.js'

const DEFAULT_DIR = path.join(os.homedir(), '.mailquery')

const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v === 'true' || v === 'yes')

const envSchema = z.object({
  MAILQUERY_BATCH_SIZE: z.coerce.number().int().min(0).default(100),
  MAILQUERY_BATCH_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MAILQUERY_TRUNCATE_OPERANDS: flag,
  MAILQUERY_TOKEN_FILE: z.string().min(1).default(path.join(DEFAULT_DIR, 'token.json')),
  MAILQUERY_CLIENT_ID: z.string().min(1).optional(),
  MAILQUERY_CLIENT_SECRET: z.string().min(1).optional(),
})

export interface Config {
  /** 0 fetches message details one by one. */
  batchSize: number
  batchDelayMs: number
  truncateOperands: boolean
  tokenFile: string
  clientId: string | null
  clientSecret: string | null
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config | ValidationError {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ValidationError({
      field: issue ? issue.path.join('.') : 'environment',
      reason: issue?.message ?? 'invalid configuration',
    })
  }

  const data = parsed.data
  return {
    batchSize: data.MAILQUERY_BATCH_SIZE,
    batchDelayMs: data.MAILQUERY_BATCH_DELAY_MS,
    truncateOperands: data.MAILQUERY_TRUNCATE_OPERANDS,
    tokenFile: data.MAILQUERY_TOKEN_FILE,
    clientId: data.MAILQUERY_CLIENT_ID ?? null,
    clientSecret: data.MAILQUERY_CLIENT_SECRET ?? null,
  }
}
