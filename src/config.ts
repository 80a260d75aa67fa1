import path from 'path';
import { ZodError, z } from 'zod';

export interface EnvValidationMeta {
  code: 'INVALID_ENV';
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid environment: ${JSON.stringify(meta)}`);
    this.name = 'EnvValidationError';
    this.meta = meta;
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  SLACK_BOT_TOKEN: z.string().min(1),
  SLACK_SIGNING_SECRET: z.string().min(1),
  // Only needed in socket mode
  SLACK_APP_TOKEN: z.string().min(1).optional(),
  SOCKET_MODE: booleanFlag,
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_FILE_PATH: z.string().min(1).default(path.join(__dirname, '../data/store.json')),
  ADMIN_USER_IDS: z
    .string()
    .default('')
    .transform(value =>
      value
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0)
    ),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STREAK_SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(60)
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate the environment. Throws EnvValidationError listing every missing
 * or malformed variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  try {
    const config = envSchema.parse(env);
    if (config.SOCKET_MODE && !config.SLACK_APP_TOKEN) {
      throw new EnvValidationError({ code: 'INVALID_ENV', missing: ['SLACK_APP_TOKEN'], invalid: [] });
    }
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        if (issue.code === 'invalid_type' && issue.received === 'undefined') {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({ code: 'INVALID_ENV', missing: [...missing], invalid: [...invalid] });
    }

    throw error;
  }
};
