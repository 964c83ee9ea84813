import { describe, it, expect, beforeEach } from 'vitest';
import { createLocatorFixture } from '../helpers/registry-fixture.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { Foo, Bar, Clock, FixedClock } from '../helpers/services.js';
import { PERSISTENT_GROUP } from '../../src/infrastructure/hierarchy/in-memory-hierarchy.js';
import { asGroupId } from '../../src/registry/scope.js';
import { defineServiceToken } from '../../src/registry/service-type.js';

describe('ServiceLocator', () => {
  let fixture: ReturnType<typeof createLocatorFixture>;

  beforeEach(() => {
    fixture = createLocatorFixture({ group: 'Level1' });
  });

  describe('global', () => {
    it('creates the global once and keeps returning it', () => {
      const { locator, hierarchy } = fixture;

      const global = locator.global();

      expect(locator.global()).toBe(global);
      expect(locator.index.global).toBe(global);
      expect(global.scope).toEqual({ kind: 'global', persistent: true });
      expect(hierarchy.groupOf(global.member)).toBe(PERSISTENT_GROUP);
    });

    it('logs the creation at debug level', () => {
      fixture.locator.global();

      expect(fixture.logs.hasEntry('debug', 'Creating global registry')).toBe(true);
    });

    it('uses a declared global bootstrapper when the host has one', () => {
      const { locator, hierarchy } = fixture;
      const host = hierarchy.createMember('App');
      const bootstrapper = locator.attachGlobalBootstrapper(host, false);

      expect(locator.global()).toBe(bootstrapper.registry);
      expect(bootstrapper.activated).toBe(true);
      expect(hierarchy.groupOf(host)).toBe(asGroupId('Level1'));
    });

    it('spawns a global when the declared bootstrapper cannot claim the slot', () => {
      const { locator, hierarchy, logs } = fixture;
      const host = hierarchy.createMember('Host');
      const grouped = locator.attach(host);
      expectOk(grouped.assignGroupScope(grouped.group), 'group scope');
      const bootstrapper = locator.attachGlobalBootstrapper(host);

      const first = locator.global();

      expect(first).not.toBe(grouped);
      expect(first.isGlobal).toBe(true);
      expect(locator.global()).toBe(first);
      expect(bootstrapper.activated).toBe(true);
      expect(grouped.scope).toEqual({ kind: 'group', group: 'Level1' });
      expect(logs.getEntries('error')[0]?.fields['tag']).toBe('ScopeAlreadyAssigned');
    });
  });

  describe('forGroupOf', () => {
    it('bootstraps the group registry declared on a root member', () => {
      const { locator, hierarchy } = fixture;
      const levelRoot = hierarchy.createMember('LevelRoot');
      const bootstrapper = locator.attachGroupBootstrapper(levelRoot);
      const door = hierarchy.createMember('Door', { parent: levelRoot });

      const registry = locator.forGroupOf(door);

      expect(registry).toBe(bootstrapper.registry);
      expect(registry.scope).toEqual({ kind: 'group', group: 'Level1' });
    });

    it('falls back to the global for a group without a registry', () => {
      const { locator, hierarchy } = fixture;
      const door = hierarchy.createMember('Door');

      expect(locator.forGroupOf(door)).toBe(locator.global());
    });
  });

  describe('for', () => {
    it('returns the registry on the nearest ancestor', () => {
      const { locator, hierarchy } = fixture;
      const squad = hierarchy.createMember('Squad');
      const registry = locator.attach(squad);
      const soldier = hierarchy.createMember('Soldier', { parent: squad });

      expect(locator.for(soldier)).toBe(registry);
      expect(locator.for(squad)).toBe(registry);
    });

    it('resolves services registered at every level', () => {
      const { locator, hierarchy } = fixture;
      const Greeting = defineServiceToken('Greeting', (v): v is string => typeof v === 'string');
      locator.global().register(Clock, new FixedClock(1000)).register(Greeting, 'hello');
      const levelRoot = hierarchy.createMember('LevelRoot');
      locator.attachGroupBootstrapper(levelRoot);
      locator.forGroupOf(levelRoot).register(Bar, new Bar('level'));
      const soldier = hierarchy.createMember('Soldier', { parent: levelRoot });

      const registry = locator.for(soldier);

      expect(registry.get(Clock).now()).toBe(1000);
      expect(registry.get(Bar).label).toBe('level');
      expect(registry.get(Greeting)).toBe('hello');
    });
  });

  describe('attach', () => {
    it('returns the registry a member already carries', () => {
      const { locator, hierarchy } = fixture;
      const member = hierarchy.createMember('Host');

      expect(locator.attach(member)).toBe(locator.attach(member));
    });

    it('defaults bootstrapper persistence to the configured value', () => {
      const custom = createLocatorFixture({ registry: { persistGlobal: false } });
      const host = custom.hierarchy.createMember('App');

      const bootstrapper = custom.locator.attachGlobalBootstrapper(host);
      expectOk(bootstrapper.activate(), 'host start-up');

      expect(bootstrapper.registry.scope).toEqual({ kind: 'global', persistent: false });
    });
  });

  describe('reset', () => {
    it('forgets the global and every group mapping', () => {
      const { locator, hierarchy } = fixture;
      const oldGlobal = locator.global();
      const levelRoot = hierarchy.createMember('LevelRoot');
      expectOk(locator.attachGroupBootstrapper(levelRoot).activate(), 'group start-up');

      locator.reset();

      expect(locator.index.global).toBeNull();
      expect(locator.index.registryForGroup(asGroupId('Level1'))).toBeNull();
      expect(locator.global()).not.toBe(oldGlobal);
    });
  });

  describe('reset and scope tags', () => {
    it('leaves a former global scoped, so it cannot claim the slot again', () => {
      const { locator } = fixture;
      const oldGlobal = locator.global();

      locator.reset();
      const error = expectErr(oldGlobal.assignGlobalScope(true), 'former global after reset');

      expect(oldGlobal.scope).toEqual({ kind: 'global', persistent: true });
      expect(error).toMatchObject({ _tag: 'ScopeAlreadyAssigned', current: 'global', requested: 'global' });
      expect(locator.index.global).toBeNull();
    });
  });

  describe('group transitions', () => {
    it('drops the group registry and keeps the persistent global', () => {
      const { locator, hierarchy } = fixture;
      const global = locator.global().register(Foo, new Foo(42));
      const levelRoot = hierarchy.createMember('LevelRoot');
      const level = locator.attachGroupBootstrapper(levelRoot);
      expectOk(level.activate(), 'group start-up');

      hierarchy.transitionTo('Level2');

      expect(level.registry.isDestroyed).toBe(true);
      expect(locator.index.registryForGroup(asGroupId('Level1'))).toBeNull();
      expect(locator.global()).toBe(global);
      const npc = hierarchy.createMember('Npc');
      expect(locator.for(npc).get(Foo).value).toBe(42);
    });

    it('loses a non-persistent global with its group', () => {
      const custom = createLocatorFixture({ group: 'Level1', registry: { persistGlobal: false } });
      const first = custom.locator.global();

      custom.hierarchy.transitionTo('Level2');

      expect(first.isDestroyed).toBe(true);
      const second = custom.locator.global();
      expect(second).not.toBe(first);
      expect(custom.hierarchy.groupOf(second.member)).toBe(asGroupId('Level2'));
    });
  });
});
