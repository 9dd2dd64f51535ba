import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js';
import { resolveForUser, type BotContext } from '../services/botContext.js';
import { TicketCreationError } from '../utils/errors.js';
import { armedMessage, cancelButtonRow, getChatId, submittedMessage } from '../utils/discord.js';
import type { Command } from './index.js';

export const ticket: Command = {
  data: new SlashCommandBuilder()
    .setName('ticket')
    .setDescription('Start a ticket; send a voice message or text next')
    .addStringOption(option =>
      option.setName('text')
        .setDescription('Ticket text (skips the voice step)')
        .setRequired(false))
    .addStringOption(option =>
      option.setName('repo')
        .setDescription('Repository short name')
        .setRequired(false)),

  async execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    const chatId = getChatId(interaction.channel, interaction.channelId);
    const userId = interaction.user.id;
    const text = interaction.options.getString('text')?.trim() || undefined;

    const resolved = resolveForUser(ctx, chatId, userId, interaction.options.getString('repo'));
    if (!resolved.ok) {
      await interaction.reply({ content: `❌ ${resolved.error.message}`, flags: MessageFlags.Ephemeral });
      return;
    }

    await interaction.deferReply();

    try {
      const result = await ctx.sessions.startIntake(
        chatId,
        userId,
        resolved.target,
        text ? { content: text, author: interaction.user.username } : undefined,
      );
      if (!result.ok) {
        await interaction.editReply({ content: `⚠️ ${result.error.message}` });
        return;
      }
      if (result.session.state === 'pending') {
        await interaction.editReply({ content: submittedMessage(result.session) });
        return;
      }
      await interaction.editReply({
        content: armedMessage(result.session, ctx.settings.armTtlMs),
        components: [cancelButtonRow(userId)],
      });
    } catch (error) {
      if (!(error instanceof TicketCreationError)) throw error;
      console.error('[ticket]', error.message);
      await interaction.editReply({
        content: `❌ ${error.message}\nYour ticket is still open; send the text again to retry.`,
        components: [cancelButtonRow(userId)],
      });
    }
  }
};
