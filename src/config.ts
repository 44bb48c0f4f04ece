import { z } from 'zod';
import { ConfigError } from './errors';
import { defaultConcurrency } from './utils/WorkerPool';
import { LogLevel, isLogLevel } from './utils/logger';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant. Please follow the instructions exactly.';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((value) => ['true', '1', 'yes'].includes(value))
]);

const logLevel = z.custom<LogLevel>((value) => typeof value === 'string' && isLogLevel(value), {
  message: 'Unknown log level'
});

export const configSchema = z.object({
  concurrency: z.coerce.number().int().positive().default(defaultConcurrency),
  parallel: booleanFlag.default(true),
  model: z.string().min(1).default(DEFAULT_MODEL),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  timeoutMs: z.coerce.number().int().positive().optional(),
  logLevel: logLevel.default('info'),
  logFile: z.string().min(1).optional(),
  jsonLogs: booleanFlag.default(false),
  outDir: z.string().min(1).default('.'),
  apiKey: z.string().min(1).optional()
});

export type ChainweaveConfig = z.infer<typeof configSchema>;

/**
 * Builds the run configuration from the environment, with explicit overrides taking precedence.
 * With `parallel` off the effective concurrency is 1.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ChainweaveConfig> = {}
): ChainweaveConfig {
  const fromEnv: Record<string, string | undefined> = {
    concurrency: env.CHAINWEAVE_CONCURRENCY,
    parallel: env.CHAINWEAVE_PARALLEL,
    model: env.CHAINWEAVE_MODEL,
    timeoutMs: env.CHAINWEAVE_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
    apiKey: env.OPENAI_API_KEY
  };

  const merged: Record<string, unknown> = {};
  for (const source of [fromEnv, overrides]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value !== '') merged[key] = value;
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const config = parsed.data;
  return config.parallel ? config : { ...config, concurrency: 1 };
}
