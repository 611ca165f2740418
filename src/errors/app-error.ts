import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/** Process-level failures. Pier and ship operations have their own error codes. */
export type AppError = ConfigInvalidError | UnexpectedError;

/**
 * Marks a config value as having come through `loadConfig`.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
