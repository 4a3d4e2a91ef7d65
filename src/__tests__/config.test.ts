/**
 * Settings schema tests
 */


import {
  parseSettings,
  parseHostSettings,
  parseLayerSettings,
  toHostRecord,
  defineHosts,
  isNixpkgsProvider,
  isDarwinProvider,
} from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { captureError, mkProviders } from './fixtures.js';

describe('parseSettings', () => {
  it('fills in defaults', () => {
    const cfg = parseSettings({});
    expect(cfg.auto).toEqual({ enable: false });
    expect(cfg.hosts).toEqual({});
    expect(cfg.perClass('nixos')).toEqual({});
    expect(cfg.perArch('x86_64')).toEqual({});
  });

  it('keeps layer functions as given', () => {
    const perClass = (cls: string) => ({ specialArgs: { cls } });
    const cfg = parseSettings({ perClass });
    expect(cfg.perClass).toBe(perClass);
  });

  it('rejects unknown top-level keys', () => {
    expect(() => parseSettings({ host: {} })).toThrow(ConfigurationError);
  });

  it('lists every issue with its path', () => {
    const err = captureError(() =>
      parseSettings({ hosts: { web: { class: 'bsd', arch: 'sparc' } } })
    );
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({
      code: 'INVALID_CONFIG',
      subject: 'settings',
      message: expect.stringContaining('  - hosts.web.class: '),
    });
    expect(err).toMatchObject({ message: expect.stringContaining('  - hosts.web.arch: ') });
  });

  it('passes the systems filter through', () => {
    const cfg = parseSettings({ auto: { enable: true, systems: ['aarch64-darwin'] } });
    expect(cfg.auto.systems).toEqual(['aarch64-darwin']);
  });

  it('defineHosts returns its argument', () => {
    const settings = { auto: { enable: true } };
    expect(defineHosts(settings)).toBe(settings);
  });
});

describe('parseHostSettings', () => {
  it('defaults class, arch and flags', () => {
    expect(parseHostSettings({}, 'server.json')).toEqual({
      class: 'nixos',
      arch: 'x86_64',
      pure: false,
      deployable: false,
      modules: [],
      specialArgs: {},
      builderOverrides: {},
    });
  });

  it('accepts paths, inline modules and functions as modules', () => {
    const fn = () => ({});
    const inline = { key: 'custom', services: { ssh: true } };
    const parsed = parseHostSettings({ modules: ['./hw.nix', inline, fn] }, 'server');
    expect(parsed.modules[0]).toBe('./hw.nix');
    expect(parsed.modules[1]).toBe(inline);
    expect(parsed.modules[2]).toBe(fn);
  });

  it('rejects a platform set directly', () => {
    expect(() => parseHostSettings({ platform: 'x86_64-linux' }, 'server.json')).toThrow(
      /server\.json[\s\S]*Unrecognized key/
    );
  });

  it('rejects non-module entries', () => {
    expect(() => parseHostSettings({ modules: [42] }, 'server.json')).toThrow(
      /modules\.0/
    );
  });

  it('accepts builder overrides with the expected shape', () => {
    const { nixpkgs } = mkProviders();
    const parsed = parseHostSettings({ builderOverrides: { nixpkgs } }, 'server');
    expect(parsed.builderOverrides.nixpkgs).toBe(nixpkgs);
  });

  it('rejects builder overrides without a builder', () => {
    expect(() =>
      parseHostSettings({ builderOverrides: { darwin: { lib: {} } } }, 'mac')
    ).toThrow(/builderOverrides\.darwin: expected \{ lib\.darwinSystem \}/);
  });
});

describe('parseLayerSettings', () => {
  it('accepts only modules and special args', () => {
    expect(parseLayerSettings({ modules: ['a'] }, 'default.json')).toEqual({
      modules: ['a'],
      specialArgs: {},
    });
    expect(() => parseLayerSettings({ class: 'darwin' }, 'default.json')).toThrow(
      ConfigurationError
    );
  });
});

describe('toHostRecord', () => {
  it('derives the platform', () => {
    const record = toHostRecord('mac', parseHostSettings({ class: 'darwin', arch: 'aarch64' }, 'mac'));
    expect(record.platform).toBe('aarch64-darwin');
    expect(record.source).toBeNull();
  });

  it('places the host path before its modules', () => {
    const record = toHostRecord(
      'server',
      parseHostSettings({ path: '/cfg/server.nix', modules: ['extra.nix'] }, 'server'),
      '/cfg/hosts/server.json'
    );
    expect(record.modules).toEqual(['/cfg/server.nix', 'extra.nix']);
    expect(record.source).toBe('/cfg/hosts/server.json');
  });
});

describe('provider guards', () => {
  it('recognize complete providers', () => {
    const providers = mkProviders();
    expect(isNixpkgsProvider(providers.nixpkgs)).toBe(true);
    expect(isDarwinProvider(providers.darwin)).toBe(true);
  });

  it('require outPath on nixpkgs', () => {
    expect(isNixpkgsProvider({ lib: { nixosSystem: () => null } })).toBe(false);
  });

  it('reject other values', () => {
    expect(isDarwinProvider(null)).toBe(false);
    expect(isDarwinProvider({ lib: { darwinSystem: 'nope' } })).toBe(false);
  });
});
