/**
 * Nominal typing for values that have passed a boundary check.
 *
 * A string-keyed marker keeps zod transforms that produce branded values exportable.
 * Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
