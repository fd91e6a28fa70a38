/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the environment surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../core/errors/cache-error.js';
import type { VerifyMode } from '../cache/local-artifact-cache.js';

export const DEFAULT_BUCKET = 'visual-behavior-ophys-data';
export const DEFAULT_PROJECT = 'visual-behavior-ophys';
export const DEFAULT_REGION = 'us-west-2';
export const DEFAULT_CACHE_DIR_NAME = '.ophys-cloud-cache';

export interface AppConfig {
  readonly project: string;
  readonly cache: {
    readonly rootDir: string;
    readonly verify: VerifyMode;
    readonly lockWaitMs: number;
    readonly staleLockMs: number;
  };
  readonly download: {
    readonly retries: number;
    readonly retryBaseDelayMs: number;
  };
  readonly remote: {
    readonly bucket: string;
    readonly region: string;
    readonly endpoint?: string;
    readonly forcePathStyle: boolean;
    readonly accessKeyId?: string;
    readonly secretAccessKey?: string;
    readonly sessionToken?: string;
  };
  /** JSON compatibility table replacing the embedded default. */
  readonly compatibilityFile?: string;
}

export type ValidatedConfig = Brand<AppConfig, 'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Base for the default cache directory; the user's home when omitted. */
  readonly homeDir?: string;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

function integerVar(name: string, defaultValue: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(defaultValue)
    );
}

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const EnvSchema = z.object({
  OPHYS_CACHE_DIR: optionalText,
  OPHYS_CACHE_BUCKET: optionalText,
  OPHYS_CACHE_PROJECT: optionalText.pipe(
    z.string().regex(/^[A-Za-z0-9._-]+$/, 'OPHYS_CACHE_PROJECT must be a plain name').optional()
  ),
  AWS_REGION: optionalText,
  OPHYS_CACHE_ENDPOINT: optionalText.pipe(z.string().url('OPHYS_CACHE_ENDPOINT must be a URL').optional()),
  OPHYS_CACHE_FORCE_PATH_STYLE: z.enum(['0', '1']).default('0'),
  AWS_ACCESS_KEY_ID: optionalText,
  AWS_SECRET_ACCESS_KEY: optionalText,
  AWS_SESSION_TOKEN: optionalText,

  OPHYS_CACHE_DOWNLOAD_RETRIES: integerVar('OPHYS_CACHE_DOWNLOAD_RETRIES', 3, 0, 10),
  OPHYS_CACHE_RETRY_BASE_MS: integerVar('OPHYS_CACHE_RETRY_BASE_MS', 1_000, 0, 60_000),
  OPHYS_CACHE_LOCK_WAIT_MS: integerVar('OPHYS_CACHE_LOCK_WAIT_MS', 600_000, 0, 86_400_000),
  OPHYS_CACHE_STALE_LOCK_MS: integerVar('OPHYS_CACHE_STALE_LOCK_MS', 3_600_000, 1_000, 604_800_000),
  OPHYS_CACHE_VERIFY: z.enum(['size', 'digest']).default('digest'),
  OPHYS_CACHE_COMPATIBILITY_FILE: optionalText,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options.homeDir ?? os.homedir())));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, homeDir: string): AppConfig {
  return {
    project: env.OPHYS_CACHE_PROJECT ?? DEFAULT_PROJECT,
    cache: {
      rootDir: path.resolve(env.OPHYS_CACHE_DIR ?? path.join(homeDir, DEFAULT_CACHE_DIR_NAME)),
      verify: env.OPHYS_CACHE_VERIFY,
      lockWaitMs: env.OPHYS_CACHE_LOCK_WAIT_MS,
      staleLockMs: env.OPHYS_CACHE_STALE_LOCK_MS,
    },
    download: {
      retries: env.OPHYS_CACHE_DOWNLOAD_RETRIES,
      retryBaseDelayMs: env.OPHYS_CACHE_RETRY_BASE_MS,
    },
    remote: {
      bucket: env.OPHYS_CACHE_BUCKET ?? DEFAULT_BUCKET,
      region: env.AWS_REGION ?? DEFAULT_REGION,
      ...(env.OPHYS_CACHE_ENDPOINT !== undefined ? { endpoint: env.OPHYS_CACHE_ENDPOINT } : {}),
      forcePathStyle: env.OPHYS_CACHE_FORCE_PATH_STYLE === '1',
      ...(env.AWS_ACCESS_KEY_ID !== undefined ? { accessKeyId: env.AWS_ACCESS_KEY_ID } : {}),
      ...(env.AWS_SECRET_ACCESS_KEY !== undefined ? { secretAccessKey: env.AWS_SECRET_ACCESS_KEY } : {}),
      ...(env.AWS_SESSION_TOKEN !== undefined ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    },
    ...(env.OPHYS_CACHE_COMPATIBILITY_FILE !== undefined
      ? { compatibilityFile: path.resolve(env.OPHYS_CACHE_COMPATIBILITY_FILE) }
      : {}),
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
