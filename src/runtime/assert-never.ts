/**
 * Exhaustiveness helper for discriminated unions.
 * A new union member that is not handled turns the call site into a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
