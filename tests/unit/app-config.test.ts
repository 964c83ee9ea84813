import { describe, it, expect } from 'vitest';
import { loadConfig, defaultConfig, DEFAULT_GLOBAL_MEMBER_NAME } from '../../src/config/app-config.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'empty env');

    expect(config).toEqual({
      logging: { level: 'silent' },
      registry: { globalMemberName: DEFAULT_GLOBAL_MEMBER_NAME, persistGlobal: true },
    });
    expect(config).toEqual(defaultConfig());
  });

  it('normalizes the log level', () => {
    const config = expectOk(loadConfig({ env: { SCOPE_REGISTRY_LOG_LEVEL: ' DEBUG ' } }), 'padded level');

    expect(config.logging.level).toBe('debug');
  });

  it('reads the global member name and persistence flag', () => {
    const config = expectOk(
      loadConfig({ env: { SCOPE_REGISTRY_GLOBAL_NAME: '  Root Services ', SCOPE_REGISTRY_PERSIST_GLOBAL: '0' } }),
      'registry settings'
    );

    expect(config.registry).toEqual({ globalMemberName: 'Root Services', persistGlobal: false });
  });

  it('reports an unknown log level under its variable name', () => {
    const error = expectErr(loadConfig({ env: { SCOPE_REGISTRY_LOG_LEVEL: 'verbose' } }), 'bad level');

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.path).toBe('SCOPE_REGISTRY_LOG_LEVEL');
  });

  it('rejects a blank global member name', () => {
    const error = expectErr(loadConfig({ env: { SCOPE_REGISTRY_GLOBAL_NAME: '   ' } }), 'blank name');

    expect(error.issues).toEqual([
      { path: 'SCOPE_REGISTRY_GLOBAL_NAME', message: 'SCOPE_REGISTRY_GLOBAL_NAME cannot be empty' },
    ]);
  });

  it('rejects a persistence flag other than 0 or 1', () => {
    const error = expectErr(loadConfig({ env: { SCOPE_REGISTRY_PERSIST_GLOBAL: 'yes' } }), 'bad flag');

    expect(error.issues.map((i) => i.path)).toEqual(['SCOPE_REGISTRY_PERSIST_GLOBAL']);
  });
});
