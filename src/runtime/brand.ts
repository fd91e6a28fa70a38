/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it crossed a validating boundary (manifest parse,
 * compatibility check, config load). Brands are erased at runtime.
 *
 * NOTE: string-keyed marker rather than `unique symbol` so zod schemas that
 * transform into branded types can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
