import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  DATA_DIR: z.string().min(1).optional(),
  INGEST_TOKEN: z.string().min(16).optional(),
  DEFAULT_TIMEZONE: z.string().min(1).optional(),
  PARSER_DEBUG: z.enum(['0', '1']).optional(),
});

export type Env = z.infer<typeof envSchema>;

function getRawEnv(): Record<string, string | undefined> {
  return {
    DATA_DIR: process.env.DATA_DIR,
    INGEST_TOKEN: process.env.INGEST_TOKEN,
    DEFAULT_TIMEZONE: process.env.DEFAULT_TIMEZONE,
    PARSER_DEBUG: process.env.PARSER_DEBUG,
  };
}

export function getEnv(): Env {
  const parsed = envSchema.safeParse(getRawEnv());
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }
  return parsed.data;
}

export function getDefaultTimezone(): string {
  const raw = process.env.DEFAULT_TIMEZONE;
  if (!raw || raw.trim().length === 0) return 'Europe/Madrid';
  return raw;
}

export function getDataDir(): string {
  const raw = process.env.DATA_DIR;
  if (!raw || raw.trim().length === 0) return path.join(process.cwd(), 'data');
  return path.resolve(raw);
}
