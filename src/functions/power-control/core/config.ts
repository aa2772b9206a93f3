/**
 * Configuration loader for power-control.
 *
 * Reads the process environment, validates it with Zod and maps it onto the
 * typed Config used by the rest of the tool. LOG_LEVEL and LOG_FORMAT are not
 * part of it: setupLogger reads them.
 */

import path from 'path';
import { z } from 'zod';
import type { Config } from '@shared/types';
import { isValidTimeZone } from './schedule';

const TRUE_VALUES: ReadonlySet<string> = new Set(['true', 'yes', 'on', '1']);

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when an environment variable holds an invalid value.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  return value;
}

function lowerCased(value: unknown): unknown {
  const cleaned = blankToUndefined(value);
  return typeof cleaned === 'string' ? cleaned.toLowerCase() : cleaned;
}

const text = (defaultValue = '') =>
  z.preprocess(blankToUndefined, z.string().default(defaultValue));

// An empty value falls back to the default rather than meaning false
const flag = (defaultValue: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value) =>
        value === undefined ? defaultValue : TRUE_VALUES.has(value.toLowerCase())
      )
  );

const list = (normalize: (entry: string) => string) =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((entry) => normalize(entry.trim()))
        .filter((entry) => entry.length > 0)
    );

const EnvSchema = z
  .object({
    ADMIN_EMAIL: text(),
    APP_VERSION: text('unknown'),
    AWS_DEFAULT_REGION: text('us-west-2'),
    AWS_SES_CONFIGURATION_SET: text(),
    DRY_RUN: flag(true),
    IMMEDIATE: flag(true),
    NOTIFICATION_WAIT_HOURS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().nonnegative().default(12)
    ),
    POWER_ACTION: z.preprocess(lowerCased, z.enum(['stop', 'terminate']).default('stop')),
    PROTECTED_OWNERS: list((owner) => owner.toLowerCase()),
    REGIONS: list((region) => region),
    SEND_EMAIL: flag(false),
    SMTP_FROM: text(),
    SMTP_HOST: text(),
    SMTP_PORT: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(1).max(65535).default(465)
    ),
    SMTP_USERNAME: text(),
    SMTP_PASSWORD: z.string().optional().default(''),
    TEMPLATE_PATH: text(),
    TRACKING_FILE: text('/data/power-control.json'),
    TZ: text('Etc/UTC').refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  })
  .superRefine((env, ctx) => {
    if (env.SEND_EMAIL && !env.SMTP_FROM) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SMTP_FROM'],
        message: 'Required when SEND_EMAIL is enabled',
      });
    }
  });

/**
 * Loads configuration from environment variables.
 *
 * @param env - Environment to read, defaults to process.env
 * @returns Validated configuration object
 *
 * @throws {ConfigValidationError} If a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')} (${issue.message})`
    );
    throw new ConfigValidationError(
      `Configuration validation failed. Invalid variables: ${problems.join(', ')}`,
      { cause: parsed.error }
    );
  }

  const values = parsed.data;

  return {
    adminEmail: values.ADMIN_EMAIL,
    awsDefaultRegion: values.AWS_DEFAULT_REGION,
    awsSesConfigurationSet: values.AWS_SES_CONFIGURATION_SET,
    dryRun: values.DRY_RUN,
    immediate: values.IMMEDIATE,
    notificationWaitHours: values.NOTIFICATION_WAIT_HOURS,
    powerAction: values.POWER_ACTION,
    protectedOwners: values.PROTECTED_OWNERS,
    regions: values.REGIONS,
    sendEmail: values.SEND_EMAIL,
    smtpFrom: values.SMTP_FROM,
    smtpHost: values.SMTP_HOST,
    smtpPort: values.SMTP_PORT,
    smtpUsername: values.SMTP_USERNAME,
    smtpPassword: values.SMTP_PASSWORD,
    templatePath: values.TEMPLATE_PATH || path.resolve(process.cwd(), 'templates'),
    trackingFile: values.TRACKING_FILE,
    tz: values.TZ,
    version: values.APP_VERSION,
  };
}
