import { matchesServiceType, serviceTypeName, type ServiceType } from './service-type.js';

interface Entry {
  readonly typeName: string;
  readonly instance: unknown;
}

/**
 * Per-registry map from service type to exactly one instance.
 * No hierarchy awareness: fallback lives in `RegistryNode`.
 */
export class ServiceTable {
  private readonly entries = new Map<object, Entry>();

  /** Last registration for a type wins. */
  register<T>(type: ServiceType<T>, instance: T): void {
    this.entries.set(type, { typeName: serviceTypeName(type), instance });
  }

  /** Registers under the instance's own constructor. */
  registerOwn(instance: object): void {
    const type = instance.constructor;
    this.entries.set(type, { typeName: type.name || '(anonymous class)', instance });
  }

  tryGet<T>(type: ServiceType<T>): T | undefined {
    const entry = this.entries.get(type);
    if (!entry) return undefined;
    return matchesServiceType(type, entry.instance) ? entry.instance : undefined;
  }

  has(type: ServiceType<unknown>): boolean {
    return this.entries.has(type);
  }

  get size(): number {
    return this.entries.size;
  }

  typeNames(): string[] {
    return [...this.entries.values()].map((e) => e.typeName);
  }

  clear(): void {
    this.entries.clear();
  }
}
