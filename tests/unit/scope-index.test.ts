import { describe, it, expect } from 'vitest';
import { createContextFixture } from '../helpers/registry-fixture.js';
import { ScopeIndex } from '../../src/registry/scope-index.js';
import { asGroupId } from '../../src/registry/scope.js';
import type { HostMember } from '../../src/infrastructure/hierarchy/in-memory-hierarchy.js';

describe('ScopeIndex', () => {
  function twoNodes() {
    const { hierarchy, attach, context } = createContextFixture();
    return {
      index: context.index,
      a: attach(hierarchy.createMember('A')),
      b: attach(hierarchy.createMember('B')),
    };
  }

  it('allocates increasing registry ids from 1', () => {
    const index = new ScopeIndex<HostMember>();

    expect([index.allocateRegistryId(), index.allocateRegistryId(), index.allocateRegistryId()]).toEqual([1, 2, 3]);
  });

  it('starts empty', () => {
    const index = new ScopeIndex<HostMember>();

    expect(index.global).toBeNull();
    expect(index.registryForGroup(asGroupId('Main'))).toBeNull();
    expect(index.groupEntries().size).toBe(0);
    expect(index.scratch).toEqual([]);
  });

  it('releases the global slot held by a node', () => {
    const { index, a } = twoNodes();
    index.claimGlobal(a);

    expect(index.release(a)).toEqual({ kind: 'global' });
    expect(index.global).toBeNull();
  });

  it('releases the group a node governs and only that group', () => {
    const { index, a, b } = twoNodes();
    index.claimGroup(asGroupId('Level1'), a);
    index.claimGroup(asGroupId('Level2'), b);

    expect(index.release(a)).toEqual({ kind: 'group', group: 'Level1' });
    expect(index.registryForGroup(asGroupId('Level1'))).toBeNull();
    expect(index.registryForGroup(asGroupId('Level2'))).toBe(b);
  });

  it('reports nothing released for a node holding no slot', () => {
    const { index, a, b } = twoNodes();
    index.claimGlobal(a);

    expect(index.release(b)).toEqual({ kind: 'none' });
    expect(index.global).toBe(a);
  });

  it('hands out a copy of the group map', () => {
    const { index, a } = twoNodes();
    index.claimGroup(asGroupId('Level1'), a);

    const entries = index.groupEntries();
    index.release(a);

    expect(entries.get(asGroupId('Level1'))).toBe(a);
    expect(index.groupEntries().size).toBe(0);
  });

  it('clears every slot and the scratch buffer on reset', () => {
    const { index, a, b } = twoNodes();
    index.claimGlobal(a);
    index.claimGroup(asGroupId('Level1'), b);
    index.scratch.push(a.member);

    index.reset();

    expect(index.global).toBeNull();
    expect(index.groupEntries().size).toBe(0);
    expect(index.scratch).toEqual([]);
  });
});
