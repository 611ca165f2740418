/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue } from '../errors/app-error.js';
import type { ValidatedAppConfig } from '../errors/app-error.js';
import { formatPortRange, parsePortRange, rangesOverlap } from '../domain/port-range.js';
import type { PortRange } from '../domain/port-range.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type HarborPath = Brand<string, 'HarborPath'>;
export type PollIntervalMs = Brand<number, 'PollIntervalMs'>;
export type BootTimeoutMs = Brand<number, 'BootTimeoutMs'>;

export interface AppConfig {
  readonly harbor: { readonly root: HarborPath };
  readonly ports: {
    /** HTTP service ports handed to ships. */
    readonly service: PortRange;
    /** Ames (peer-to-peer) ports handed to ships. */
    readonly peer: PortRange;
  };
  readonly runtime: {
    readonly binary: string;
    /** When set, `<binaryDir>/urbit-vX.Y` is used per pier runtime version. */
    readonly binaryDir: string | null;
    readonly bootTimeoutMs: BootTimeoutMs;
  };
  readonly lock: { readonly pollMs: PollIntervalMs };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_HARBOR_PATH = '/var/harbor';
export const DEFAULT_HTTP_PORT_RANGE = '8300..8400';
export const DEFAULT_AMES_PORT_RANGE = '4300..4400';

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const portRange = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value, ctx): PortRange => {
      const parsed = parsePortRange(value ?? fallback);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
        return z.NEVER;
      }
      return parsed.value;
    });

const positiveMs = (name: string, fallback: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(1, `${name} must be at least 1ms`)
        .max(max, `${name} cannot exceed ${max}ms`)
        .default(fallback)
    );

const EnvSchema = z
  .object({
    HARBORMASTER_HARBOR_PATH: z.string().min(1, 'HARBORMASTER_HARBOR_PATH cannot be empty').default(DEFAULT_HARBOR_PATH),
    HARBORMASTER_HTTP_PORT_RANGE: portRange(DEFAULT_HTTP_PORT_RANGE),
    HARBORMASTER_AMES_PORT_RANGE: portRange(DEFAULT_AMES_PORT_RANGE),
    HARBORMASTER_RUNTIME_DIR: z.string().min(1).optional(),
    HARBORMASTER_RUNTIME_BIN: z.string().min(1, 'HARBORMASTER_RUNTIME_BIN cannot be empty').default('urbit'),
    HARBORMASTER_LOCK_POLL_MS: positiveMs('HARBORMASTER_LOCK_POLL_MS', 50, 60_000),
    HARBORMASTER_BOOT_TIMEOUT_MS: positiveMs('HARBORMASTER_BOOT_TIMEOUT_MS', 300_000, 3_600_000),
  })
  .superRefine((env, ctx) => {
    if (rangesOverlap(env.HARBORMASTER_HTTP_PORT_RANGE, env.HARBORMASTER_AMES_PORT_RANGE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HARBORMASTER_AMES_PORT_RANGE'],
        message: `overlaps the HTTP range (${formatPortRange(env.HARBORMASTER_HTTP_PORT_RANGE)} and ${formatPortRange(env.HARBORMASTER_AMES_PORT_RANGE)})`,
      });
    }
  });

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ReturnType<typeof Err.configInvalid>>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
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

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    harbor: { root: env.HARBORMASTER_HARBOR_PATH as HarborPath },
    ports: {
      service: env.HARBORMASTER_HTTP_PORT_RANGE,
      peer: env.HARBORMASTER_AMES_PORT_RANGE,
    },
    runtime: {
      binary: env.HARBORMASTER_RUNTIME_BIN,
      binaryDir: env.HARBORMASTER_RUNTIME_DIR ?? null,
      bootTimeoutMs: env.HARBORMASTER_BOOT_TIMEOUT_MS as BootTimeoutMs,
    },
    lock: { pollMs: env.HARBORMASTER_LOCK_POLL_MS as PollIntervalMs },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
