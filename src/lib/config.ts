import path from 'node:path';
import { z } from 'zod';
import { getOS } from './common/os/index.ts';
import { ValidationError } from './errors.ts';

const ProfileSchema = z.object({
  id: z.string().min(1),
  image: z.string().default('ship:latest'),
  runtimeType: z.string().default('ship'),
  runtimePort: z.number().int().positive().default(8123),
  resources: z
    .object({
      cpus: z.number().positive().default(1),
      memory: z.string().default('1g'),
    })
    .default({}),
  capabilities: z.array(z.string()).default(['filesystem', 'shell', 'python']),
  idleTimeoutSeconds: z.number().int().positive().default(1800),
  env: z.record(z.string()).default({}),
});

const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().positive(),
  initialDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
  backoffFactor: z.number().min(1),
});

export const ConfigSchema = z.object({
  databasePath: z.string().default(path.join(process.cwd(), 'data', 'shoal.db')),
  driver: z.enum(['docker', 'mock']).default('docker'),
  docker: z
    .object({
      hostAddress: z.string().default('127.0.0.1'),
      network: z.string().optional(),
      mountPath: z.string().default('/workspace'),
    })
    .default({}),
  /** Namespace for labels the driver puts on instances and volumes. */
  labelPrefix: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/)
    .default('shoal'),
  workspaceSizeLimitMb: z.number().int().positive().default(1024),
  startTimeoutMs: z.number().int().positive().default(120000),
  driverTimeoutMs: z.number().int().positive().default(30000),
  readiness: RetryPolicySchema.default({
    maxAttempts: 240,
    initialDelayMs: 500,
    maxDelayMs: 1000,
    backoffFactor: 2,
  }),
  /** Hint returned with session_not_ready. */
  retryAfterMs: z.number().int().positive().default(1000),
  maxTtlSeconds: z.number().int().positive().default(7 * 24 * 3600),
  maxExtendBySeconds: z.number().int().positive().default(24 * 3600),
  idempotency: z
    .object({
      enabled: z.boolean().default(true),
      ttlSeconds: z.number().int().positive().default(3600),
    })
    .default({}),
  gc: z
    .object({
      enabled: z.boolean().default(true),
      runOnStartup: z.boolean().default(true),
      expiredSandboxIntervalMs: z.number().int().positive().default(60000),
      idleSessionIntervalMs: z.number().int().positive().default(30000),
      staleSessionIntervalMs: z.number().int().positive().default(60000),
      orphanWorkspaceIntervalMs: z.number().int().positive().default(300000),
      orphanInstanceIntervalMs: z.number().int().positive().default(120000),
      idempotencyIntervalMs: z.number().int().positive().default(600000),
      reclaimExternalWorkspaces: z.boolean().default(false),
      itemConcurrency: z.number().int().positive().default(4),
      itemRetry: RetryPolicySchema.default({
        maxAttempts: 2,
        initialDelayMs: 200,
        maxDelayMs: 1000,
        backoffFactor: 2,
      }),
    })
    .default({}),
  profiles: z
    .array(ProfileSchema)
    .min(1)
    .default([
      { id: 'python-default', image: 'ship:latest' },
      {
        id: 'python-data',
        image: 'ship:data',
        resources: { cpus: 2, memory: '4g' },
      },
    ]),
});

export type ShoalConfig = z.infer<typeof ConfigSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Validates a raw config object and fills in defaults.
 */
export function parseConfig(input: unknown): ShoalConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new ValidationError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown'}`, {
      path: where,
    });
  }
  return result.data;
}

export function getProfile(config: ShoalConfig, profileId: string): Profile | undefined {
  return config.profiles.find((p) => p.id === profileId);
}

/**
 * Age past which a pending or starting session cannot belong to a start of this process:
 * the start budget plus one driver call.
 */
export function staleStartMs(config: ShoalConfig): number {
  return config.startTimeoutMs + config.driverTimeoutMs;
}

function readConfigFile(): Record<string, unknown> {
  const os = getOS();
  const candidates = [os.env.get('SHOAL_CONFIG_FILE'), path.join(process.cwd(), 'shoal.config.json')];

  for (const candidate of candidates) {
    if (!candidate || !os.fs.exists(candidate)) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(os.fs.read(candidate));
    } catch (err) {
      throw new ValidationError(
        `Config file ${candidate} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ValidationError(`Config file ${candidate} must contain a JSON object`);
    }
    return { ...parsed };
  }
  return {};
}

function envNumber(key: string): number | undefined {
  const raw = getOS().env.get(key);
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number, got "${raw}"`, { variable: key });
  }
  return value;
}

function envBoolean(key: string): boolean | undefined {
  const raw = getOS().env.get(key);
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
}

/**
 * Loads configuration: defaults, then the JSON config file, then SHOAL_* environment overrides.
 */
export function loadConfig(overrides: Record<string, unknown> = {}): ShoalConfig {
  const env = getOS().env;
  const raw: Record<string, unknown> = { ...readConfigFile(), ...overrides };

  const dbPath = env.get('SHOAL_DB_PATH');
  if (dbPath) raw.databasePath = dbPath;

  const driver = env.get('SHOAL_DRIVER');
  if (driver) raw.driver = driver;

  const labelPrefix = env.get('SHOAL_LABEL_PREFIX');
  if (labelPrefix) raw.labelPrefix = labelPrefix;

  const startTimeout = envNumber('SHOAL_START_TIMEOUT_MS');
  if (startTimeout !== undefined) raw.startTimeoutMs = startTimeout;

  const idempotencyTtl = envNumber('SHOAL_IDEMPOTENCY_TTL_SECONDS');
  if (idempotencyTtl !== undefined) {
    raw.idempotency = { ...asRecord(raw.idempotency), ttlSeconds: idempotencyTtl };
  }

  const gcEnabled = envBoolean('SHOAL_GC_ENABLED');
  if (gcEnabled !== undefined) {
    raw.gc = { ...asRecord(raw.gc), enabled: gcEnabled };
  }

  return parseConfig(raw);
}
