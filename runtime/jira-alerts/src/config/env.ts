/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { LogLevel } from '@nestjs/common';
import { z } from 'zod';

const commaSeparated = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const LOG_LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const satisfies readonly LogLevel[];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(9050),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  ALLOWED_ORIGINS: z.string().default('*'),
  // body-parser size, e.g. "10mb"
  MAX_BODY_SIZE: z
    .string()
    .regex(/^\d+(b|kb|mb)?$/i, 'must be a size such as 512kb or 10mb')
    .default('10mb'),

  // Jira server and credentials
  JIRA_URL: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  JIRA_USERNAME: z.string().min(1),
  JIRA_PASSWORD: z.string().min(1),
  JIRA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Ranked transition names, tried in order
  RESOLVE_TRANSITIONS: commaSeparated('Resolve Issue,Close Issue,Close,Done,Resolve'),
  REOPEN_TRANSITIONS: commaSeparated('Reopen Issue,Reopen,To Do,In Progress'),
  RESOLVED_STATUS: commaSeparated('resolved,closed,done,complete'),

  FINGERPRINT_LABEL_PREFIX: z
    .string()
    .regex(/^\S+$/, 'must not contain whitespace')
    .default('jiralert'),
  UPDATE_EXISTING_ISSUES: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type Env = z.infer<typeof EnvSchema>;

export type EnvOverrides = Partial<Record<keyof Env, string>>;

export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment variables:\n${msg}`);
  }
  return parsed.data;
}

/**
 * Nest takes the full list of enabled levels rather than a threshold.
 */
export function logLevels(threshold: Env['LOG_LEVEL']): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}
