import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { z } from 'zod';
import type { DeployCorrelator } from './deployCorrelator.js';
import type { DeployEvent } from '../types/index.js';
import { NotificationError } from '../utils/errors.js';

const DeployPayloadSchema = z.object({
  siteName: z.string().min(1),
  status: z.enum(['succeeded', 'failed']),
  branch: z.string().min(1),
  buildUrl: z.string().min(1),
});

/** Deploy notification as sent by Netlify outgoing webhooks. */
const NetlifyPayloadSchema = z
  .object({
    name: z.string().min(1),
    state: z.enum(['ready', 'error']),
    branch: z.string().min(1),
    deploy_ssl_url: z.string().optional(),
    ssl_url: z.string().optional(),
    url: z.string().optional(),
  })
  .refine((p) => Boolean(p.deploy_ssl_url ?? p.ssl_url ?? p.url), { message: 'missing build url' });

export function parseDeployPayload(payload: unknown, receivedAt: number): DeployEvent | undefined {
  const direct = DeployPayloadSchema.safeParse(payload);
  if (direct.success) {
    return { ...direct.data, timestamp: receivedAt };
  }
  const netlify = NetlifyPayloadSchema.safeParse(payload);
  if (netlify.success) {
    const p = netlify.data;
    return {
      siteName: p.name,
      status: p.state === 'ready' ? 'succeeded' : 'failed',
      branch: p.branch,
      buildUrl: p.deploy_ssl_url ?? p.ssl_url ?? p.url ?? '',
      timestamp: receivedAt,
    };
  }
  return undefined;
}

export interface WebhookAppOptions {
  correlator: DeployCorrelator;
  secret?: string;
  now?: () => number;
}

export function createWebhookApp(options: WebhookAppOptions): Hono {
  const now = options.now ?? Date.now;
  const app = new Hono();

  app.get('/', (c) => c.json({ ok: true }));

  app.post('/deploy/webhook', async (c) => {
    if (options.secret && c.req.header('x-webhook-secret') !== options.secret) {
      console.warn('[webhook] Rejected delivery with a bad secret');
      return c.json({ ok: false, error: 'unauthorized' }, 401);
    }

    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return c.json({ ok: false, error: 'invalid json' }, 400);
    }

    const event = parseDeployPayload(payload, now());
    if (!event) {
      return c.json({ ok: false, error: 'invalid payload' }, 400);
    }

    try {
      const outcome = await options.correlator.onDeployEvent(event);
      if (outcome.kind === 'ignored') {
        return c.json({ ok: true, ignored: outcome.reason }, 202);
      }
      return c.json({ ok: true, ticketRef: outcome.plan.ticketRef });
    } catch (error) {
      if (error instanceof NotificationError) {
        console.error('[webhook]', error.message);
        return c.json({ ok: false, error: 'notification failed' }, 502);
      }
      throw error;
    }
  });

  return app;
}

export function startWebhookServer(app: Hono, port: number): ServerType {
  return serve({ fetch: app.fetch, port }, (info) => {
    console.log(`[webhook] Listening on port ${info.port}`);
  });
}
