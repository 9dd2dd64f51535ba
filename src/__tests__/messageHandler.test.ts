import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createHarness } from './helpers.js';
import { processContent } from '../handlers/messageHandler.js';
import type { BotContext } from '../services/botContext.js';
import type { Transcriber } from '../services/transcriptionService.js';
import { resolveSettings } from '../services/configStore.js';

const GLEB = '42692410';

describe('processContent', () => {
  let h: ReturnType<typeof createHarness>;
  let ctx: BotContext;
  const transcribe = vi.fn<Transcriber>();
  const download = vi.fn(async (_url: string) => new Uint8Array([1, 2, 3]));

  beforeEach(() => {
    vi.clearAllMocks();
    h = createHarness();
    ctx = {
      registry: h.registry,
      sessions: h.sessions,
      selections: h.store,
      transcribe,
      settings: resolveSettings({}, {}),
    };
  });

  async function arm() {
    const target = {
      repo: { ownerRepo: 'Owner/mahjong-core', shortName: 'mj', defaultBranch: 'dev/Gleb' },
      branch: 'dev/Gleb',
      labels: ['developer:Gleb'],
    };
    await h.sessions.startIntake('chat', GLEB, target);
  }

  it('should ignore messages when nothing is armed', async () => {
    const reply = await processContent(ctx, { chatId: 'chat', userId: GLEB, author: 'gleb', text: 'hello' }, { download });

    expect(reply).toBeUndefined();
    expect(h.createTicket).not.toHaveBeenCalled();
  });

  it('should submit text for an armed session', async () => {
    await arm();

    const reply = await processContent(ctx, { chatId: 'chat', userId: GLEB, author: 'gleb', text: ' Fix scoring ' }, { download });

    expect(reply).toBe(
      '🎫 Ticket created: T1\n⏳ I\'ll ping you when **mj** (Owner/mahjong-core) @ `dev/Gleb` deploys.',
    );
    expect(h.createTicket).toHaveBeenCalledWith(expect.objectContaining({ content: 'Fix scoring', author: 'gleb' }));
  });

  it('should transcribe audio and submit the transcript', async () => {
    await arm();
    transcribe.mockResolvedValue('Add a hint button');

    await processContent(
      ctx,
      { chatId: 'chat', userId: GLEB, author: 'gleb', text: '', audioUrl: 'https://cdn.test/voice.ogg' },
      { download },
    );

    expect(download).toHaveBeenCalledWith('https://cdn.test/voice.ogg');
    expect(h.createTicket).toHaveBeenCalledWith(expect.objectContaining({ content: 'Add a hint button' }));
  });

  it('should not download audio when nothing is armed', async () => {
    await processContent(
      ctx,
      { chatId: 'chat', userId: GLEB, author: 'gleb', text: '', audioUrl: 'https://cdn.test/voice.ogg' },
      { download },
    );

    expect(download).not.toHaveBeenCalled();
  });

  it('should keep the session armed on an empty transcript', async () => {
    await arm();
    transcribe.mockResolvedValue('');

    const reply = await processContent(
      ctx,
      { chatId: 'chat', userId: GLEB, author: 'gleb', text: '', audioUrl: 'https://cdn.test/voice.ogg' },
      { download },
    );

    expect(reply).toBe('😕 Could not recognise any speech. Try again.');
    expect(h.sessions.getState('chat', GLEB)).toBe('armed');
  });

  it('should report ticket creation failures and stay armed', async () => {
    await arm();
    h.createTicket.mockRejectedValueOnce(new Error('rate limited'));

    const reply = await processContent(ctx, { chatId: 'chat', userId: GLEB, author: 'gleb', text: 'Fix it' }, { download });

    expect(reply).toBe('❌ Ticket creation failed: rate limited\nYour ticket is still open; send it again to retry.');
    expect(h.sessions.getState('chat', GLEB)).toBe('armed');
  });

  it('should create a ticket in one step when the command is not required', async () => {
    ctx.settings = { ...ctx.settings, requireTicketCommand: false };

    const reply = await processContent(ctx, { chatId: 'chat', userId: GLEB, author: 'gleb', text: 'Fix it' }, { download });

    expect(reply).toContain('Ticket created: T1');
    expect(h.sessions.getState('chat', GLEB)).toBe('pending');
  });

  it('should create a ticket in one step from a direct message', async () => {
    const reply = await processContent(
      ctx,
      { chatId: 'dm', userId: GLEB, author: 'gleb', text: 'Fix it', direct: true },
      { download },
    );

    expect(reply).toContain('Ticket created: T1');
    expect(h.sessions.getState('dm', GLEB)).toBe('pending');
  });

  it('should transcribe a direct voice message without an armed session', async () => {
    transcribe.mockResolvedValue('Add a hint button');

    await processContent(
      ctx,
      { chatId: 'dm', userId: GLEB, author: 'gleb', text: '', audioUrl: 'https://cdn.test/voice.ogg', direct: true },
      { download },
    );

    expect(download).toHaveBeenCalledWith('https://cdn.test/voice.ogg');
    expect(h.createTicket).toHaveBeenCalledWith(expect.objectContaining({ content: 'Add a hint button' }));
  });
});
