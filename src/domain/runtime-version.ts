import { z } from 'zod';

export const RUNTIME_VERSIONS = ['v1.0', 'v1.1', 'v1.2', 'v1.3', 'v1.4', 'v1.5', 'v1.6', 'v1.7', 'v1.8', 'v1.9'] as const;

export type RuntimeVersion = (typeof RUNTIME_VERSIONS)[number];

export const DEFAULT_RUNTIME_VERSION: RuntimeVersion = 'v1.9';

/**
 * `"v1.9"`, `"1.9"` and `1.9` all name the same runtime.
 */
export function parseRuntimeVersion(input: unknown): RuntimeVersion | null {
  if (typeof input === 'number') {
    return RUNTIME_VERSIONS.find((v) => Number(v.slice(1)) === input) ?? null;
  }
  if (typeof input === 'string') {
    const candidate = input.startsWith('v') ? input : `v${input}`;
    return RUNTIME_VERSIONS.find((v) => v === candidate) ?? null;
  }
  return null;
}

export const RuntimeVersionSchema = z.union([z.string(), z.number()]).transform((value, ctx): RuntimeVersion => {
  const parsed = parseRuntimeVersion(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid runtime version: ${String(value)} (expected "vMAJOR.MINOR" or MAJOR.MINOR)`,
    });
    return z.NEVER;
  }
  return parsed;
});
