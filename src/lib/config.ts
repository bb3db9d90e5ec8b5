import fs from 'fs/promises';
import { z } from 'zod';
import { getConfigPath } from './dirs';
import { ConfigError, errorMessage } from './errors';
import { logger } from './logger';

const FailureRuleSchema = z
  .object({
    active: z.string().min(1).optional(),
    sub: z.string().min(1).optional(),
  })
  .strict()
  .refine(rule => rule.active !== undefined || rule.sub !== undefined, {
    message: 'a failure rule needs "active", "sub" or both',
  });

const EmailSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().min(1),
  port: z.number().int().positive().default(587),
  secure: z.boolean().default(false),
  user: z.string().optional(),
  pass: z.string().optional(),
  from: z.string().min(1),
  to: z.array(z.string().min(1)).min(1),
});

const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  scope: z.enum(['system', 'user']).default('system'),
  bus: z
    .object({
      callTimeoutMs: z.number().int().positive().default(10_000),
      propertyReadConcurrency: z.number().int().positive().default(16),
    })
    .default({}),
  watcher: z
    .object({
      ignore: z.array(z.string()).default([]),
      ignoreFile: z.string().optional(),
      notifyTimeoutMs: z.number().int().positive().default(5_000),
      // keyed by unit type, plus "default"
      failureRules: z.record(z.array(FailureRuleSchema)).optional(),
    })
    .default({}),
  notifications: z
    .object({
      desktop: z
        .object({
          enabled: z.boolean().default(true),
          appName: z.string().default('unitscope'),
          icon: z.string().default('text-x-systemd-unit'),
          urgency: z.enum(['low', 'normal', 'critical']).default('critical'),
          expireMs: z.number().int().min(0).optional(),
          // one notification per unit, through notify-send --replace-id
          replace: z.boolean().default(true),
        })
        .default({}),
      email: EmailSchema.optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type BusScope = AppConfig['scope'];
export type EmailConfig = z.infer<typeof EmailSchema>;
export type DesktopConfig = AppConfig['notifications']['desktop'];

export const DEFAULT_CONFIG: AppConfig = ConfigSchema.parse({});

export function parseConfig(raw: unknown): AppConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return result.data;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

function applyEnv(config: AppConfig): AppConfig {
  const scope = process.env.UNITSCOPE_SCOPE;
  if (scope === 'system' || scope === 'user') {
    config = { ...config, scope };
  } else if (scope) {
    logger.warn('Config', `Ignoring UNITSCOPE_SCOPE=${scope} (expected system or user)`);
  }
  return config;
}

/**
 * Reads config.json from the config dir. A missing file gives the defaults;
 * an unreadable or invalid one is reported and also gives the defaults.
 */
export async function getConfig(configPath: string = getConfigPath()): Promise<AppConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      logger.warn('Config', `Cannot read ${configPath}, using defaults: ${errorMessage(error)}`);
    }
    return applyEnv(DEFAULT_CONFIG);
  }

  try {
    return applyEnv(parseConfig(JSON.parse(content)));
  } catch (error) {
    logger.warn('Config', `Failed to load ${configPath}, using defaults: ${errorMessage(error)}`);
    return applyEnv(DEFAULT_CONFIG);
  }
}
