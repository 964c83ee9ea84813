import type { ServiceNotRegistered } from './registry-error.js';
import { Err } from './factories.js';

/**
 * Thrown by `RegistryNode.get` and `RegistryNode.use` when the whole fallback chain
 * misses. Callers that can live without the service use `tryGet` or `resolve` instead.
 */
export class ServiceNotRegisteredError extends Error {
  readonly code = 'SERVICE_NOT_REGISTERED';
  readonly serviceType: string;

  constructor(detail: ServiceNotRegistered) {
    super(detail.message);
    this.name = 'ServiceNotRegisteredError';
    this.serviceType = detail.serviceType;
  }

  static forType(serviceType: string): ServiceNotRegisteredError {
    return new ServiceNotRegisteredError(Err.serviceNotRegistered(serviceType));
  }
}
