import { ButtonInteraction, MessageFlags } from 'discord.js';
import type { BotContext } from '../services/botContext.js';
import { cancelButtonRow, getChatId } from '../utils/discord.js';

export async function handleButton(interaction: ButtonInteraction, ctx: BotContext) {
  const customId = interaction.customId;

  const [action, authorId] = customId.split('_');

  if (!authorId) {
    await interaction.reply({
      content: '❌ Invalid button.',
      flags: MessageFlags.Ephemeral
    });
    return;
  }

  if (action === 'cancel') {
    await handleCancel(interaction, ctx, authorId);
  } else {
    await interaction.reply({
      content: '❌ Unknown action.',
      flags: MessageFlags.Ephemeral
    });
  }
}

async function handleCancel(interaction: ButtonInteraction, ctx: BotContext, authorId: string) {
  if (interaction.user.id !== authorId) {
    await interaction.reply({ content: '🙂 This is not your ticket.', flags: MessageFlags.Ephemeral });
    return;
  }

  const chatId = getChatId(interaction.channel, interaction.channelId);
  const cancelled = await ctx.sessions.cancel(chatId, authorId);

  if (cancelled) {
    await interaction.update({ content: '🛑 Ticket cancelled.', components: [cancelButtonRow(authorId, true)] });
  } else {
    await interaction.reply({ content: '⚠️ Nothing to cancel.', flags: MessageFlags.Ephemeral });
  }
}
