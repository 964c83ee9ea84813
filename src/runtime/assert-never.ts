/**
 * Exhaustiveness check for discriminated unions; a new union member turns the
 * `default` branch of a `switch` into a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
