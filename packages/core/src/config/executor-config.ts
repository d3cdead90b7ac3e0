import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { MAX_TIMER_MS } from '../executor/deadline.js';

function numberFromEnv(schema: z.ZodNumber) {
  return z.preprocess((value) => {
    if (typeof value === 'string') {
      return Number(value.trim());
    }

    return value;
  }, schema);
}

function booleanFromEnv() {
  return z.preprocess((value) => {
    if (typeof value !== 'string') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') {
      return true;
    }
    if (normalized === 'false' || normalized === '0') {
      return false;
    }
    return value;
  }, z.boolean());
}

const positiveInt = () => z.number().int().min(1);
// Settings that end up as a single setTimeout delay
const timerMs = (min: number) => z.number().int().min(min).max(MAX_TIMER_MS);

export const executorConfigSchema = z
  .object({
    maxAttempts: numberFromEnv(positiveInt()).default(5),
    baseDelayMs: numberFromEnv(timerMs(0)).default(1000),
    maxDelayMs: numberFromEnv(timerMs(0)).default(60_000),
    rateCapacity: numberFromEnv(positiveInt()).default(10),
    rateRefillPerSecond: numberFromEnv(z.number().positive()).default(10),
    maxConnectionsPerHost: numberFromEnv(positiveInt()).default(5),
    defaultTimeoutMs: numberFromEnv(positiveInt()).default(300_000),
    attemptTimeoutMs: numberFromEnv(timerMs(1)).optional(),
    poolAcquireTimeoutMs: numberFromEnv(timerMs(1)).optional(),
    connectionIdleTimeoutMs: numberFromEnv(positiveInt()).default(30_000),
    proxyUrl: z
      .string()
      .url('proxyUrl must be an absolute URL')
      .refine(
        (value) => URL.canParse(value) && /^https?:$/.test(new URL(value).protocol),
        'proxyUrl must use http or https',
      )
      .optional(),
    proxyUsername: z.string().min(1).optional(),
    proxyPassword: z.string().optional(),
    verifyTls: booleanFromEnv().default(true),
    /** PEM bundle trusted for https origins. */
    caFile: z.string().min(1).optional(),
    retryNonIdempotentOnResponse: booleanFromEnv().default(true),
    retryNonIdempotentOnAmbiguous: booleanFromEnv().default(false),
    debug: booleanFromEnv().default(false),
  })
  .refine((config) => config.maxDelayMs >= config.baseDelayMs, {
    message: 'maxDelayMs must not be smaller than baseDelayMs',
    path: ['maxDelayMs'],
  });

type ExecutorConfig = z.output<typeof executorConfigSchema>;

const ENV_KEYS = {
  REST_MAX_ATTEMPTS: 'maxAttempts',
  REST_BASE_DELAY_MS: 'baseDelayMs',
  REST_MAX_DELAY_MS: 'maxDelayMs',
  REST_RATE_CAPACITY: 'rateCapacity',
  REST_RATE_REFILL_PER_SECOND: 'rateRefillPerSecond',
  REST_MAX_CONNECTIONS_PER_HOST: 'maxConnectionsPerHost',
  REST_DEFAULT_TIMEOUT_MS: 'defaultTimeoutMs',
  REST_ATTEMPT_TIMEOUT_MS: 'attemptTimeoutMs',
  REST_POOL_ACQUIRE_TIMEOUT_MS: 'poolAcquireTimeoutMs',
  REST_CONNECTION_IDLE_TIMEOUT_MS: 'connectionIdleTimeoutMs',
  REST_PROXY_URL: 'proxyUrl',
  REST_PROXY_USERNAME: 'proxyUsername',
  REST_PROXY_PASSWORD: 'proxyPassword',
  REST_VERIFY_TLS: 'verifyTls',
  REST_CA_FILE: 'caFile',
  REST_RETRY_NON_IDEMPOTENT_ON_RESPONSE: 'retryNonIdempotentOnResponse',
  REST_RETRY_NON_IDEMPOTENT_ON_AMBIGUOUS: 'retryNonIdempotentOnAmbiguous',
  REST_DEBUG: 'debug',
} as const satisfies Record<string, keyof ExecutorConfig>;

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};

  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }

  return values;
}

/**
 * Resolves the executor configuration. Explicit overrides win over
 * `REST_*` environment variables, which win over the defaults.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function loadExecutorConfig(
  overrides: Partial<ExecutorConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ExecutorConfig {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = executorConfigSchema.safeParse({ ...readEnv(env), ...definedOverrides });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  return parsed.data;
}

export type { ExecutorConfig };
