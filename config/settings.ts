/**
 * Service settings
 * Read once from the environment at startup; every invalid value is reported together.
 */

import { z } from 'zod';
import { PATHS } from './paths.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const SettingsSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  LESSON_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  LESSON_TIMEOUT_SECONDS: z.coerce.number().positive().max(600).default(15),
  GENERATION_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  LESSON_SERIALIZE_BY_FINGERPRINT: booleanFlag.default('true'),
  LESSON_DATA_DIR: z.string().min(1).default(PATHS.DATA_DIR),
  LESSON_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(0).default(30),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001)
});

export interface Settings {
  openai: {
    apiKey?: string;
    model: string;
    baseURL?: string;
  };
  generation: {
    maxTokens: number;
    timeoutSeconds: number;
    retryBackoffMs: number;
  };
  serializeByFingerprint: boolean;
  /** Lesson creations per client per minute; 0 disables the limit */
  rateLimitPerMinute: number;
  dataDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  port: number;
}

/**
 * Empty strings count as unset, as with most shell-provided environments
 */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return values;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(presentValues(env));

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    openai: {
      apiKey: values.OPENAI_API_KEY,
      model: values.OPENAI_MODEL,
      baseURL: values.OPENAI_BASE_URL
    },
    generation: {
      maxTokens: values.LESSON_MAX_TOKENS,
      timeoutSeconds: values.LESSON_TIMEOUT_SECONDS,
      retryBackoffMs: values.GENERATION_RETRY_BACKOFF_MS
    },
    serializeByFingerprint: values.LESSON_SERIALIZE_BY_FINGERPRINT,
    rateLimitPerMinute: values.LESSON_RATE_LIMIT_PER_MINUTE,
    dataDir: values.LESSON_DATA_DIR,
    logLevel: values.LOG_LEVEL,
    port: values.PORT
  };
}
