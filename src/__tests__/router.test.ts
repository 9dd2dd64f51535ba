import { describe, it, expect } from 'vitest';
import { loadRegistry } from '../services/registry.js';
import { resolveTarget, type ResolveResult } from '../services/router.js';

const web = { ownerRepo: 'acme/web', shortName: 'web', defaultBranch: 'main' };
const api = { ownerRepo: 'acme/api', shortName: 'api', defaultBranch: 'develop' };

const multi = loadRegistry({
  repos: 'acme/web:web:main,acme/api:api:develop',
  developers: 'dev1:dev/alice:frontend',
  chats: 'chat-api:acme/api',
});

const single = loadRegistry({
  repos: 'acme/web:web:main',
  developers: 'dev1:dev/alice:frontend',
});

function errorKind(result: ResolveResult): string | undefined {
  return result.ok ? undefined : result.error.kind;
}

describe('resolveTarget', () => {
  it('should use the explicit short name with the developer branch', () => {
    const result = resolveTarget(multi, { chatId: 'chat-x', userId: 'dev1', explicitShortName: 'web' });

    expect(result).toEqual({ ok: true, target: { repo: web, branch: 'dev/alice', labels: ['frontend'] } });
  });

  it('should use the default branch for an explicit repo and an unbound user', () => {
    const result = resolveTarget(multi, { chatId: 'chat-x', userId: 'someone', explicitShortName: 'api' });

    expect(result).toEqual({ ok: true, target: { repo: api, branch: 'develop', labels: [] } });
  });

  it('should fail with UnknownRepo for an unknown short name', () => {
    const result = resolveTarget(multi, { chatId: 'chat-api', userId: 'dev1', explicitShortName: 'nope' });

    expect(errorKind(result)).toBe('UnknownRepo');
  });

  it('should combine a developer binding with the chat repository', () => {
    const result = resolveTarget(multi, { chatId: 'chat-api', userId: 'dev1' });

    expect(result).toEqual({ ok: true, target: { repo: api, branch: 'dev/alice', labels: ['frontend'] } });
  });

  it('should fall back to the only repository for a developer', () => {
    const result = resolveTarget(single, { chatId: 'chat-x', userId: 'dev1' });

    expect(result).toEqual({ ok: true, target: { repo: web, branch: 'dev/alice', labels: ['frontend'] } });
  });

  it('should report AmbiguousRepo for a developer with several repositories', () => {
    const result = resolveTarget(multi, { chatId: 'chat-x', userId: 'dev1' });

    expect(errorKind(result)).toBe('AmbiguousRepo');
  });

  it('should use the chat binding with the default branch for other users', () => {
    const result = resolveTarget(multi, { chatId: 'chat-api', userId: 'someone' });

    expect(result).toEqual({ ok: true, target: { repo: api, branch: 'develop', labels: [] } });
  });

  it('should use the single repository in single-repo mode', () => {
    const result = resolveTarget(single, { chatId: 'chat-x', userId: 'someone' });

    expect(result).toEqual({ ok: true, target: { repo: web, branch: 'main', labels: [] } });
  });

  it('should report NoTargetResolved when nothing applies', () => {
    expect(errorKind(resolveTarget(multi, { chatId: 'chat-x', userId: 'someone' }))).toBe('NoTargetResolved');
    expect(errorKind(resolveTarget(loadRegistry({}), { chatId: 'c', userId: 'dev1' }))).toBe('NoTargetResolved');
  });

  it('should append default labels without duplicates', () => {
    const result = resolveTarget(single, {
      chatId: 'chat-x',
      userId: 'dev1',
      defaultLabels: ['voice', 'frontend'],
    });

    expect(result.ok && result.target.labels).toEqual(['frontend', 'voice']);
  });

  it('should return equal results for equal inputs', () => {
    const input = { chatId: 'chat-api', userId: 'dev1', defaultLabels: ['voice'] };

    expect(resolveTarget(multi, input)).toEqual(resolveTarget(multi, input));
  });
});
