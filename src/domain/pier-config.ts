import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { RuntimeVersionSchema } from './runtime-version.js';
import type { RuntimeVersion } from './runtime-version.js';
import { parsePierId, parseShipName } from './ids.js';
import type { PierId, ShipName } from './ids.js';

/**
 * The only durable state a pier keeps outside its data directory.
 */
export interface PierConfig {
  readonly runtimeVersion: RuntimeVersion;
  readonly id: PierId;
  readonly name: ShipName | null;
}

// On-disk shape: {"runtimeVersion":"v1.9","id":"<uuid>","@p":"zod"|null}
const PierConfigFileSchema = z.object({
  runtimeVersion: RuntimeVersionSchema,
  id: z.string().transform((value, ctx) => {
    const id = parsePierId(value);
    if (id === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `id is not a UUID: ${value}` });
      return z.NEVER;
    }
    return id;
  }),
  '@p': z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx) => {
      if (value === null || value === undefined) return null;
      const name = parseShipName(value);
      if (name === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `@p is not a ship name: ${value}` });
        return z.NEVER;
      }
      return name;
    }),
});

export type PierConfigParseError = { readonly reason: string };

export function parsePierConfig(text: string): Result<PierConfig, PierConfigParseError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err({ reason: `not JSON: ${e instanceof Error ? e.message : String(e)}` });
  }

  const parsed = PierConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.errors
      .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return err({ reason });
  }

  return ok({ runtimeVersion: parsed.data.runtimeVersion, id: parsed.data.id, name: parsed.data['@p'] });
}

export function serializePierConfig(config: PierConfig): string {
  return `${JSON.stringify({ runtimeVersion: config.runtimeVersion, id: config.id, '@p': config.name })}\n`;
}
