import { describe, it, expect } from 'vitest';
import { loadRegistry, RegistryHolder } from '../services/registry.js';
import { ConfigError } from '../utils/errors.js';

function loadError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected ConfigError');
}

describe('loadRegistry', () => {
  const tables = {
    repos: 'acme/web:web:main, acme/api:api:develop',
    developers: 'u1:dev/alice:frontend,u2:dev/bob:team:backend',
    sites: 'web-alice:acme/web,web-bob:acme/web,api-preview:acme/api',
    chats: 'c1:acme/api',
  };

  it('should expose every entry through its lookup', () => {
    const snapshot = loadRegistry(tables);

    expect(snapshot.byShortName('web')).toEqual({
      found: true,
      binding: { ownerRepo: 'acme/web', shortName: 'web', defaultBranch: 'main' },
    });
    expect(snapshot.byUserId('u1')).toEqual({
      found: true,
      binding: { userId: 'u1', branch: 'dev/alice', label: 'frontend' },
    });
    expect(snapshot.bySiteName('web-bob')).toEqual({
      found: true,
      binding: { siteName: 'web-bob', ownerRepo: 'acme/web' },
    });
    expect(snapshot.byChatId('c1')).toEqual({
      found: true,
      binding: { chatId: 'c1', ownerRepo: 'acme/api' },
    });
  });

  it('should keep colons inside developer labels', () => {
    const snapshot = loadRegistry(tables);

    expect(snapshot.byUserId('u2')).toEqual({
      found: true,
      binding: { userId: 'u2', branch: 'dev/bob', label: 'team:backend' },
    });
  });

  it('should return NotFound for unknown keys', () => {
    const snapshot = loadRegistry(tables);

    expect(snapshot.byShortName('nope')).toEqual({ found: false });
    expect(snapshot.byUserId('nope')).toEqual({ found: false });
    expect(snapshot.bySiteName('nope')).toEqual({ found: false });
    expect(snapshot.byChatId('nope')).toEqual({ found: false });
  });

  it('should treat missing tables as empty and skip blank entries', () => {
    const snapshot = loadRegistry({ repos: 'acme/web:web:main,, ' });

    expect(snapshot.counts()).toEqual({ repos: 1, developers: 0, sites: 0, chats: 0 });
  });

  it('should accept identical duplicate entries', () => {
    const snapshot = loadRegistry({ repos: 'acme/web:web:main,acme/web:web:main' });

    expect(snapshot.repositories()).toHaveLength(1);
  });

  it('should reject a short name repeated with a different branch', () => {
    const error = loadError(() => loadRegistry({ repos: 'acme/web:web:main,acme/web:web:dev' }));

    expect(error.kind).toBe('DuplicateKey');
    expect(error.entry).toBe('acme/web:web:dev');
  });

  it('should reject a short name bound to two repositories', () => {
    const error = loadError(() => loadRegistry({ repos: 'acme/web:web:main,acme/other:web:main' }));

    expect(error.kind).toBe('DuplicateKey');
  });

  it('should reject conflicting developer and site entries', () => {
    expect(loadError(() => loadRegistry({ developers: 'u1:a:x,u1:b:x' })).kind).toBe('DuplicateKey');
    expect(
      loadError(() => loadRegistry({ repos: 'a/b:ab:main,c/d:cd:main', sites: 's:a/b,s:c/d' })).kind,
    ).toBe('DuplicateKey');
  });

  it('should reject entries with the wrong field count', () => {
    expect(loadError(() => loadRegistry({ repos: 'acme/web:web' })).kind).toBe('MalformedEntry');
    expect(loadError(() => loadRegistry({ repos: 'acme/web:web:main:extra' })).kind).toBe('MalformedEntry');
    expect(loadError(() => loadRegistry({ developers: 'u1:branch' })).kind).toBe('MalformedEntry');
  });

  it('should reject empty fields and bad owner/repo pairs', () => {
    expect(loadError(() => loadRegistry({ repos: 'acme/web::main' })).kind).toBe('MalformedEntry');
    expect(loadError(() => loadRegistry({ repos: 'acmeweb:web:main' })).kind).toBe('MalformedEntry');
  });

  it('should reject sites and chats pointing at unknown repositories', () => {
    expect(loadError(() => loadRegistry({ sites: 'preview:acme/web' })).kind).toBe('DanglingReference');
    expect(
      loadError(() => loadRegistry({ repos: 'acme/web:web:main', chats: 'c1:acme/api' })).kind,
    ).toBe('DanglingReference');
  });

  it('should collapse short-name aliases of one repository', () => {
    const snapshot = loadRegistry({ repos: 'acme/web:web:main,acme/web:w:main' });

    expect(snapshot.repositories()).toEqual([
      { ownerRepo: 'acme/web', shortName: 'web', defaultBranch: 'main' },
    ]);
    expect(snapshot.byShortName('w').found).toBe(true);
  });
});

describe('RegistryHolder', () => {
  it('should swap in a new snapshot on reload', () => {
    const holder = new RegistryHolder(loadRegistry({ repos: 'acme/web:web:main' }));
    const before = holder.current();

    holder.reload({ repos: 'acme/api:api:main' });

    expect(holder.current()).not.toBe(before);
    expect(holder.current().byShortName('api').found).toBe(true);
    expect(before.byShortName('web').found).toBe(true);
  });

  it('should keep the previous snapshot when a reload fails', () => {
    const holder = new RegistryHolder(loadRegistry({ repos: 'acme/web:web:main' }));
    const before = holder.current();

    expect(() => holder.reload({ repos: 'broken' })).toThrow(ConfigError);
    expect(holder.current()).toBe(before);
  });
});
