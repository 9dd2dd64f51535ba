import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createHarness } from './helpers.js';
import { DeployCorrelator } from '../services/deployCorrelator.js';
import { createWebhookApp, parseDeployPayload } from '../services/webhookServer.js';
import type { Notifier, ResolvedTarget } from '../types/index.js';

const target: ResolvedTarget = {
  repo: { ownerRepo: 'Owner/mahjong-core', shortName: 'mj', defaultBranch: 'dev/Gleb' },
  branch: 'dev/Gleb',
  labels: [],
};

const payload = {
  siteName: 'mahjong-dev-gleb',
  status: 'succeeded',
  branch: 'dev/Gleb',
  buildUrl: 'https://preview.test/b1',
};

describe('parseDeployPayload', () => {
  it('should accept the direct payload', () => {
    expect(parseDeployPayload(payload, 42)).toEqual({ ...payload, timestamp: 42 });
  });

  it('should map a Netlify deploy notification', () => {
    const event = parseDeployPayload(
      { name: 'mahjong-dev-gleb', state: 'error', branch: 'dev/Gleb', deploy_ssl_url: 'https://d1.preview.test', ssl_url: 'https://site.test' },
      7,
    );

    expect(event).toEqual({
      siteName: 'mahjong-dev-gleb',
      status: 'failed',
      branch: 'dev/Gleb',
      buildUrl: 'https://d1.preview.test',
      timestamp: 7,
    });
  });

  it('should reject unknown shapes', () => {
    expect(parseDeployPayload({ siteName: 'x', status: 'building', branch: 'b', buildUrl: 'u' }, 0)).toBeUndefined();
    expect(parseDeployPayload({ name: 'x', state: 'ready', branch: 'b' }, 0)).toBeUndefined();
  });
});

describe('webhook app', () => {
  let h: ReturnType<typeof createHarness>;
  const notify = vi.fn<Notifier['notify']>(async () => {});

  beforeEach(() => {
    notify.mockReset();
    notify.mockResolvedValue(undefined);
    h = createHarness();
  });

  function app(secret?: string) {
    const correlator = new DeployCorrelator({
      registry: h.registry,
      sessions: h.sessions,
      notifier: { notify },
      retentionMs: 60_000,
      now: h.clock.now,
    });
    return createWebhookApp({ correlator, secret, now: h.clock.now });
  }

  function post(body: unknown, headers: Record<string, string> = {}) {
    return {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    };
  }

  it('should answer the health check', async () => {
    const res = await app().request('/');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('should notify and return the ticket for a matching deploy', async () => {
    await h.sessions.startIntake('chat', 'user', target, { content: 'Fix it', author: 'gleb' });

    const res = await app().request('/deploy/webhook', post(payload));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, ticketRef: 'T1' });
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it('should answer 202 with the reason for ignored events', async () => {
    const res = await app().request('/deploy/webhook', post({ ...payload, siteName: 'unknown' }));

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ ok: true, ignored: 'UnknownSite' });
  });

  it('should reject invalid payloads', async () => {
    expect((await app().request('/deploy/webhook', post({ hello: 'world' }))).status).toBe(400);
    expect((await app().request('/deploy/webhook', post('not json'))).status).toBe(400);
  });

  it('should require the shared secret when configured', async () => {
    const withSecret = app('test-secret');

    expect((await withSecret.request('/deploy/webhook', post(payload))).status).toBe(401);
    expect(
      (await withSecret.request('/deploy/webhook', post(payload, { 'x-webhook-secret': 'test-secret' }))).status,
    ).toBe(202);
  });

  it('should answer 502 when the notification fails', async () => {
    notify.mockRejectedValueOnce(new Error('discord down'));
    await h.sessions.startIntake('chat', 'user', target, { content: 'Fix it', author: 'gleb' });

    const res = await app().request('/deploy/webhook', post(payload));

    expect(res.status).toBe(502);
    expect(h.sessions.getState('chat', 'user')).toBe('pending');
  });
});
