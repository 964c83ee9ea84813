/**
 * Registry configuration - parse, don't validate.
 *
 * - Single source of truth for the configuration surface
 * - Zod validates environment variables at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/registry-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type GlobalMemberName = Brand<string, 'GlobalMemberName'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly registry: {
    /** Name of the host member spawned for a lazily created global registry. */
    readonly globalMemberName: GlobalMemberName;
    /** Whether a lazily created global registry survives group transitions. */
    readonly persistGlobal: boolean;
  };
}

export type ValidatedConfig = Brand<AppConfig, 'ValidatedAppConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_GLOBAL_MEMBER_NAME = 'ServiceRegistry [Global]';

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const EnvSchema = z.object({
  SCOPE_REGISTRY_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  SCOPE_REGISTRY_GLOBAL_NAME: z
    .string()
    .trim()
    .min(1, 'SCOPE_REGISTRY_GLOBAL_NAME cannot be empty')
    .max(128, 'SCOPE_REGISTRY_GLOBAL_NAME cannot exceed 128 characters')
    .default(DEFAULT_GLOBAL_MEMBER_NAME),

  SCOPE_REGISTRY_PERSIST_GLOBAL: z.enum(['0', '1']).default('1'),
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

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export function defaultConfig(): ValidatedConfig {
  return createValidatedConfig({
    logging: { level: 'silent' },
    registry: {
      globalMemberName: DEFAULT_GLOBAL_MEMBER_NAME as GlobalMemberName,
      persistGlobal: true,
    },
  });
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.SCOPE_REGISTRY_LOG_LEVEL },
    registry: {
      globalMemberName: env.SCOPE_REGISTRY_GLOBAL_NAME as GlobalMemberName,
      persistGlobal: env.SCOPE_REGISTRY_PERSIST_GLOBAL === '1',
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
