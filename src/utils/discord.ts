import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  type Channel,
} from 'discord.js';
import type { TicketSession } from '../types/index.js';

/** Threads share their parent channel's routing and sessions. */
export function getChatId(channel: Channel | null, fallbackId: string): string {
  if (channel?.isThread()) {
    return channel.parentId ?? fallbackId;
  }
  return fallbackId;
}

export function cancelButtonRow(userId: string, disabled = false): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>()
    .addComponents(
      new ButtonBuilder()
        .setCustomId(`cancel_${userId}`)
        .setLabel('❌ Cancel')
        .setStyle(ButtonStyle.Secondary)
        .setDisabled(disabled)
    );
}

export function describeTarget(session: Pick<TicketSession, 'resolvedRepo' | 'resolvedBranch'>): string {
  return `**${session.resolvedRepo.shortName}** (${session.resolvedRepo.ownerRepo}) @ \`${session.resolvedBranch}\``;
}

export function submittedMessage(session: TicketSession): string {
  return `🎫 Ticket created: ${session.ticketRef}\n⏳ I'll ping you when ${describeTarget(session)} deploys.`;
}

export function armedMessage(session: TicketSession, ttlMs: number): string {
  const seconds = Math.round(ttlMs / 1000);
  return `🎙️ Ticket for ${describeTarget(session)}\nSend a voice message or text within ${seconds}s.`;
}
