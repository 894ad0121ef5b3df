/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { LOG_LEVELS, type LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type ListenPort = Brand<number, 'ListenPort'>;
export type CookieBase = Brand<string, 'CookieBase'>;

export interface AppConfig {
  readonly http: {
    readonly host: string;
    readonly port: ListenPort;
  };
  readonly cookies: {
    /** Token cookies are named `<base>_<slot>` */
    readonly base: CookieBase;
    readonly path: string;
    readonly maxAgeSeconds: number;
  };
  /** JSON file with studies, batches and workers; none means an empty catalog */
  readonly catalogFile: string | null;
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

/** Longest cookie lifetime browsers reliably accept (2^31 - 1 seconds). */
export const DEFAULT_COOKIE_MAX_AGE_SECONDS = 2_147_483_647;

const EnvSchema = z.object({
  STUDY_RUNS_PORT: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(z.number().int().min(1, 'Port must be >= 1').max(65535, 'Port must be <= 65535').default(9000)),

  STUDY_RUNS_HOST: z.string().min(1, 'Host cannot be empty').default('127.0.0.1'),

  STUDY_RUNS_COOKIE_BASE: z
    .string()
    .regex(/^[A-Za-z0-9_]+$/, 'Cookie base may only contain letters, digits and underscores')
    .default('STUDY_RUN_IDS'),

  STUDY_RUNS_COOKIE_PATH: z.string().startsWith('/', 'Cookie path must start with /').default('/'),

  STUDY_RUNS_COOKIE_MAX_AGE: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('Cookie max age must be whole seconds')
        .positive('Cookie max age must be positive')
        .default(DEFAULT_COOKIE_MAX_AGE_SECONDS)
    ),

  STUDY_RUNS_CATALOG_FILE: z.string().min(1).optional(),

  STUDY_RUNS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid('environment', toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    http: {
      host: env.STUDY_RUNS_HOST,
      port: env.STUDY_RUNS_PORT as ListenPort,
    },
    cookies: {
      base: env.STUDY_RUNS_COOKIE_BASE as CookieBase,
      path: env.STUDY_RUNS_COOKIE_PATH,
      maxAgeSeconds: env.STUDY_RUNS_COOKIE_MAX_AGE,
    },
    catalogFile: env.STUDY_RUNS_CATALOG_FILE ?? null,
    logLevel: env.STUDY_RUNS_LOG_LEVEL,
  };
}
