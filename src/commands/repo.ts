import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js';
import type { BotContext } from '../services/botContext.js';
import { getChatId } from '../utils/discord.js';
import type { Command } from './index.js';

export const repo: Command = {
  data: new SlashCommandBuilder()
    .setName('repo')
    .setDescription('Pick the repository for your tickets in this channel')
    .addStringOption(option =>
      option.setName('short')
        .setDescription('Repository short name (leave empty to clear)')
        .setRequired(false)),

  async execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    const chatId = getChatId(interaction.channel, interaction.channelId);
    const userId = interaction.user.id;
    const shortName = interaction.options.getString('short')?.trim();
    const snapshot = ctx.registry.current();

    if (!shortName) {
      ctx.selections.clearSelection(chatId, userId);
      const list = snapshot.repositories()
        .map((r) => `• **${r.shortName}** → ${r.ownerRepo} (\`${r.defaultBranch}\`)`)
        .join('\n');
      await interaction.reply({
        content: `🧹 Repository selection cleared.\n${list || 'No repositories configured.'}`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    const found = snapshot.byShortName(shortName);
    if (!found.found) {
      await interaction.reply({
        content: `❌ Unknown repository \`${shortName}\`.`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    ctx.selections.setSelection({ chatId, userId, shortName });
    await interaction.reply({
      content: `✅ Tickets from you here go to **${found.binding.shortName}** (${found.binding.ownerRepo}).`,
      flags: MessageFlags.Ephemeral,
    });
  }
};
