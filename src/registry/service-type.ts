/**
 * Service type identifiers.
 *
 * A class identifies the instances it (or a subclass) constructs. Interfaces and
 * primitive-valued services have no runtime class, so they are identified by a token
 * carrying a type guard.
 */

export type ServiceClass<T> = abstract new (...args: never[]) => T;

export interface ServiceToken<T> {
  readonly kind: 'service_token';
  readonly id: symbol;
  readonly name: string;
  readonly accepts: (value: unknown) => value is T;
}

export type ServiceType<T> = ServiceClass<T> | ServiceToken<T>;

/**
 * @example
 * ```typescript
 * interface Clock { now(): number }
 * const ClockToken = defineServiceToken('Clock', (v): v is Clock =>
 *   typeof v === 'object' && v !== null && 'now' in v);
 * registry.register(ClockToken, { now: () => Date.now() });
 * ```
 */
export function defineServiceToken<T>(name: string, accepts: (value: unknown) => value is T): ServiceToken<T> {
  return { kind: 'service_token', id: Symbol(name), name, accepts };
}

export function isServiceToken<T>(type: ServiceType<T>): type is ServiceToken<T> {
  return typeof type !== 'function';
}

export function serviceTypeName(type: ServiceType<unknown>): string {
  if (isServiceToken(type)) return type.name;
  return type.name || '(anonymous class)';
}

export function matchesServiceType<T>(type: ServiceType<T>, value: unknown): value is T {
  return isServiceToken(type) ? type.accepts(value) : value instanceof type;
}
