import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js';
import type { BotContext } from '../services/botContext.js';
import { describeTarget, getChatId } from '../utils/discord.js';
import type { Command } from './index.js';

export const status: Command = {
  data: new SlashCommandBuilder()
    .setName('status')
    .setDescription('Show your current ticket'),

  async execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    const chatId = getChatId(interaction.channel, interaction.channelId);
    const session = ctx.sessions.getSession(chatId, interaction.user.id);

    if (!session) {
      await interaction.reply({ content: '💤 No ticket in progress.', flags: MessageFlags.Ephemeral });
      return;
    }

    const lines = [`📋 **${session.state}** — ${describeTarget(session)}`];
    if (session.state === 'armed' && session.armedUntil !== undefined) {
      lines.push(`⏱️ Waiting for content until <t:${Math.floor(session.armedUntil / 1000)}:T>`);
    }
    if (session.ticketRef) lines.push(`🎫 ${session.ticketRef}`);
    if (session.buildUrl) lines.push(`🔗 ${session.buildUrl}`);

    await interaction.reply({ content: lines.join('\n'), flags: MessageFlags.Ephemeral });
  }
};
