import type { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { BotContext } from '../services/botContext.js';
import { ticket } from './ticket.js';
import { repo } from './repo.js';
import { status } from './status.js';
import { help } from './help.js';

export interface Command {
  data: Pick<SlashCommandBuilder, 'name' | 'toJSON'>;
  execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
}

export const commands = new Map<string, Command>(
  [ticket, repo, status, help].map((command) => [command.data.name, command]),
);
