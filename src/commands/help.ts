import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js';
import type { Command } from './index.js';

const HELP_TEXT = [
  '**Deploy ticket bot**',
  '`/ticket` — start a ticket, then send a voice message or text.',
  '`/ticket text:<...>` — create the ticket right away.',
  '`/repo <short>` — choose the repository for your tickets here; `/repo` alone clears it.',
  '`/status` — show your current ticket.',
  'When your branch preview deploys you get a ping with the build link.',
].join('\n');

export const help: Command = {
  data: new SlashCommandBuilder()
    .setName('help')
    .setDescription('How to use the ticket bot'),

  async execute(interaction: ChatInputCommandInteraction) {
    await interaction.reply({ content: HELP_TEXT, flags: MessageFlags.Ephemeral });
  }
};
