import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors.js';

const defaultDataDir = path.join(os.homedir(), '.meshwatch');

const booleanFromEnv = (value: string | undefined): boolean | undefined =>
  value === undefined ? undefined : value === 'true' || value === '1';

const numberFromEnv = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value);

export const ConfigSchema = z.object({
  router: z.object({
    host: z.string().min(1).default('192.168.3.1'),
    port: z.number().int().min(1).max(65535).default(80),
    useSsl: z.boolean().default(false),
    verifySsl: z.boolean().default(false),
    username: z.string().min(1).default('admin'),
    password: z.string().default(''),
    primaryRouterId: z.string().min(1).default('primary'),
  }).default({}),
  polling: z.object({
    pollIntervalMs: z.number().int().positive().default(30000),
    cycleTimeoutMs: z.number().int().positive().default(25000),
    requestTimeoutMs: z.number().int().positive().default(5000),
    sessionCooldownMs: z.number().int().nonnegative().default(60000),
    unavailableGraceCycles: z.number().int().nonnegative().default(3),
  }).default({}),
  features: z.object({
    devicesTags: z.boolean().default(false),
    routerZones: z.boolean().default(false),
    emitInitialEvents: z.boolean().default(false),
  }).default({}),
  storage: z.object({
    tagsFile: z.string().default(path.join(defaultDataDir, 'device-tags.json')),
    zonesFile: z.string().default(path.join(defaultDataDir, 'router-zones.json')),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }).default({}),
}).superRefine((config, ctx) => {
  const { pollIntervalMs, cycleTimeoutMs, requestTimeoutMs } = config.polling;
  if (requestTimeoutMs >= cycleTimeoutMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['polling', 'requestTimeoutMs'],
      message: 'requestTimeoutMs must be shorter than cycleTimeoutMs',
    });
  }
  if (cycleTimeoutMs > pollIntervalMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['polling', 'cycleTimeoutMs'],
      message: 'cycleTimeoutMs must not exceed pollIntervalMs',
    });
  }
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(input: ConfigInput | Record<string, unknown> = {}): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      cause: result.error,
      context: { issues },
    });
  }
  return result.data;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  return parseConfig({
    router: {
      host: env['MESH_ROUTER_HOST'],
      port: numberFromEnv(env['MESH_ROUTER_PORT']),
      useSsl: booleanFromEnv(env['MESH_ROUTER_USE_SSL']),
      verifySsl: booleanFromEnv(env['MESH_ROUTER_VERIFY_SSL']),
      username: env['MESH_ROUTER_USER'],
      password: env['MESH_ROUTER_PASSWORD'],
      primaryRouterId: env['MESH_PRIMARY_ROUTER_ID'],
    },
    polling: {
      pollIntervalMs: numberFromEnv(env['POLL_INTERVAL_MS']),
      cycleTimeoutMs: numberFromEnv(env['CYCLE_TIMEOUT_MS']),
      requestTimeoutMs: numberFromEnv(env['REQUEST_TIMEOUT_MS']),
      sessionCooldownMs: numberFromEnv(env['SESSION_COOLDOWN_MS']),
      unavailableGraceCycles: numberFromEnv(env['UNAVAILABLE_GRACE_CYCLES']),
    },
    features: {
      devicesTags: booleanFromEnv(env['DEVICES_TAGS']),
      routerZones: booleanFromEnv(env['ROUTER_ZONES']),
      emitInitialEvents: booleanFromEnv(env['EMIT_INITIAL_EVENTS']),
    },
    storage: {
      tagsFile: env['TAGS_FILE'],
      zonesFile: env['ZONES_FILE'],
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  });
}
