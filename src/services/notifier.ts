import type { Client } from 'discord.js';
import type { NotificationPlan, Notifier } from '../types/index.js';

export interface SendTarget {
  send(content: string): Promise<unknown>;
}

export type ChannelResolver = (chatId: string) => Promise<SendTarget | undefined>;

export interface RetryOptions {
  attempts: number;
  delayMs: number;
}

const DEFAULT_RETRY: RetryOptions = { attempts: 3, delayMs: 1000 };

export function formatNotification(plan: NotificationPlan): string {
  const headline = plan.status === 'succeeded'
    ? '✅ **Task completed**'
    : '❌ **Deploy failed**';
  return [
    `<@${plan.userId}> ${headline}`,
    `🎫 Ticket: ${plan.ticketRef}`,
    `🌿 ${plan.ownerRepo} @ \`${plan.branch}\``,
    `🔗 Build: ${plan.buildUrl}`,
  ].join('\n');
}

/**
 * Delivers notifications to the chat the ticket came from. Retries are done
 * here; the correlator only sees the final failure.
 */
export class ChatNotifier implements Notifier {
  constructor(
    private readonly resolveChannel: ChannelResolver,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
  ) {}

  async notify(plan: NotificationPlan): Promise<void> {
    const content = formatNotification(plan);
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      try {
        const channel = await this.resolveChannel(plan.chatId);
        if (!channel) {
          throw new Error(`Channel ${plan.chatId} is not reachable`);
        }
        await channel.send(content);
        return;
      } catch (error) {
        lastError = error;
        console.error(`[notify] Attempt ${attempt}/${this.retry.attempts} for ${plan.ticketRef} failed:`, error);
        if (attempt < this.retry.attempts) {
          await new Promise((resolve) => setTimeout(resolve, this.retry.delayMs * attempt));
        }
      }
    }
    throw lastError;
  }
}

export function discordChannelResolver(client: Client): ChannelResolver {
  return async (chatId) => {
    const channel = await client.channels.fetch(chatId);
    if (!channel || !channel.isSendable()) return undefined;
    return { send: (content: string) => channel.send({ content }) };
  };
}
