import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/** Multi-line text for stderr; config issues one per line as `- VAR: problem`. */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${describeCause(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function describeCause(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
