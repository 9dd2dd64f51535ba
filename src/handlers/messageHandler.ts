import { Message, MessageFlags } from 'discord.js';
import { resolveForUser, type BotContext } from '../services/botContext.js';
import { downloadAudio, isAudioAttachment } from '../services/transcriptionService.js';
import { TicketCreationError, errorMessage } from '../utils/errors.js';
import { getChatId, submittedMessage } from '../utils/discord.js';

export interface IncomingContent {
  chatId: string;
  userId: string;
  author: string;
  text: string;
  audioUrl?: string;
  /** Direct messages skip the `/ticket` requirement. */
  direct?: boolean;
}

export interface ContentDeps {
  download: (url: string) => Promise<Uint8Array>;
}

/**
 * Turns a chat message into ticket content. Returns the reply to post, or
 * undefined when the message is not meant for the bot.
 */
export async function processContent(
  ctx: BotContext,
  input: IncomingContent,
  deps: ContentDeps = { download: downloadAudio },
): Promise<string | undefined> {
  const state = ctx.sessions.getState(input.chatId, input.userId);
  const armed = state === 'armed';
  const oneShot = state === 'idle' && (input.direct === true || !ctx.settings.requireTicketCommand);
  if (!armed && !oneShot) return undefined;

  let content = input.text.trim();
  if (input.audioUrl) {
    try {
      const audio = await deps.download(input.audioUrl);
      content = await ctx.transcribe(audio);
    } catch (error) {
      console.error('[transcribe] Failed:', error);
      return `❌ Transcription failed: ${errorMessage(error)}`;
    }
    if (!content) {
      return '😕 Could not recognise any speech. Try again.';
    }
  }
  if (!content) return undefined;

  try {
    if (oneShot) {
      const resolved = resolveForUser(ctx, input.chatId, input.userId);
      if (!resolved.ok) return `❌ ${resolved.error.message}`;
      const result = await ctx.sessions.startIntake(input.chatId, input.userId, resolved.target, {
        content,
        author: input.author,
      });
      return result.ok ? submittedMessage(result.session) : `⚠️ ${result.error.message}`;
    }

    const result = await ctx.sessions.submitContent(input.chatId, input.userId, { content, author: input.author });
    switch (result.status) {
      case 'submitted':
        return submittedMessage(result.session);
      case 'expired':
        return '⌛ The ticket window expired and this message was discarded. Start again with `/ticket`.';
      case 'not-armed':
        return undefined;
    }
  } catch (error) {
    if (!(error instanceof TicketCreationError)) throw error;
    console.error('[ticket]', error.message);
    return `❌ ${error.message}\nYour ticket is still open; send it again to retry.`;
  }
}

export async function handleMessageCreate(message: Message, ctx: BotContext): Promise<void> {
  if (message.author.bot) return;
  if (message.system) return;
  if (message.content.startsWith('/')) return;

  const audio = message.attachments.find((attachment) =>
    isAudioAttachment(attachment.contentType, message.flags.has(MessageFlags.IsVoiceMessage)),
  );

  const reply = await processContent(ctx, {
    chatId: getChatId(message.channel, message.channelId),
    userId: message.author.id,
    author: message.author.username,
    text: message.content,
    audioUrl: audio?.url,
    direct: message.channel.isDMBased(),
  });

  if (reply) {
    await message.reply(reply);
  }
}
