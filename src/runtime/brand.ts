/**
 * Nominal typing for primitives.
 *
 * A branded id proves it was parsed at a boundary (route param, cookie field,
 * repository record) and keeps a StudyRunId from being passed where a
 * ComponentRunId is expected. Erased at runtime.
 *
 * NOTE: string-keyed marker rather than a `unique symbol`, so zod schemas that
 * transform into branded types can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
