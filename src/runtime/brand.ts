/**
 * Nominal marker for values that have passed a parsing boundary.
 * Brands exist only in the type system.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
