import { REST, Routes } from 'discord.js';
import { getBotConfig } from '../services/configStore.js';
import { commands } from '../commands/index.js';

export async function deployCommands(): Promise<void> {
  const bot = getBotConfig();
  if (!bot) {
    throw new Error('Bot is not configured. Run "deploy-ticket-bot setup" first.');
  }

  const rest = new REST({ version: '10' }).setToken(bot.discordToken);
  const body = Array.from(commands.values()).map((command) => command.data.toJSON());

  await rest.put(Routes.applicationGuildCommands(bot.clientId, bot.guildId), { body });
  console.log(`[deploy] Registered ${body.length} slash commands`);
}
