import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(6969),
  GITHUB_BASE_URL: z.string().url().default('https://github.com'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  RESPONSE_DUMP_PATH: z.string().min(1).optional(),
  LOG_REQUESTS: booleanFlag.default('true'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
