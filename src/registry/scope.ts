import type { Brand } from '../runtime/brand.js';

/**
 * Identifier of a group in the host hierarchy (a loaded level, a tenant, a window...).
 * At most one registry node governs a given group.
 */
export type GroupId = Brand<string, 'GroupId'>;

export function asGroupId(value: string): GroupId {
  return value as GroupId;
}

/**
 * Scope held by a registry node. Assigned at most once: `unscoped` is the only
 * state a node ever leaves.
 */
export type ScopeTag =
  | { readonly kind: 'unscoped' }
  | { readonly kind: 'group'; readonly group: GroupId }
  | { readonly kind: 'global'; readonly persistent: boolean };

export type ScopeKind = ScopeTag['kind'];

export const UNSCOPED: ScopeTag = { kind: 'unscoped' };
