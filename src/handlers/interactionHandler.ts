import { Interaction, MessageFlags } from 'discord.js';
import { commands } from '../commands/index.js';
import { handleButton } from './buttonHandler.js';
import type { BotContext } from '../services/botContext.js';

export async function handleInteraction(interaction: Interaction, ctx: BotContext) {
  if (interaction.isButton()) {
    await handleButton(interaction, ctx);
    return;
  }

  if (!interaction.isChatInputCommand()) return;

  const command = commands.get(interaction.commandName);

  if (!command) {
    return;
  }

  try {
    await command.execute(interaction, ctx);
  } catch (error) {
    console.error(`[bot] /${interaction.commandName} failed:`, error);
    const content = '❌ An error occurred while executing the command.';
    if (interaction.replied || interaction.deferred) {
      await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
    } else {
      await interaction.reply({ content, flags: MessageFlags.Ephemeral });
    }
  }
}
