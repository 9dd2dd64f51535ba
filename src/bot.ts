import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { ServerType } from '@hono/node-server';
import { getBotConfig, resolveSettings, type RuntimeSettings } from './services/configStore.js';
import { loadRegistry, RegistryHolder } from './services/registry.js';
import { JsonDataStore, getDataFilePath } from './services/dataStore.js';
import { TicketSessionManager } from './services/sessionManager.js';
import { DeployCorrelator } from './services/deployCorrelator.js';
import { ChatNotifier, discordChannelResolver } from './services/notifier.js';
import { createGitHubTicketCreator } from './services/issueService.js';
import { createTranscriber } from './services/transcriptionService.js';
import { createWebhookApp, startWebhookServer } from './services/webhookServer.js';
import type { BotContext } from './services/botContext.js';
import { handleInteraction } from './handlers/interactionHandler.js';
import { handleMessageCreate } from './handlers/messageHandler.js';
import { ConfigError } from './utils/errors.js';

function describeRegistry(registry: RegistryHolder): string {
  const c = registry.current().counts();
  return `${c.repos} repos, ${c.developers} developers, ${c.sites} sites, ${c.chats} chats`;
}

export async function startBot(): Promise<void> {
  const bot = getBotConfig();
  if (!bot) {
    throw new Error('Bot is not configured. Run "deploy-ticket-bot setup" first.');
  }

  const settings: RuntimeSettings = resolveSettings();
  const registry = new RegistryHolder(loadRegistry(settings.tables));
  console.log(`[bot] Routing loaded: ${describeRegistry(registry)}`);

  const store = new JsonDataStore(getDataFilePath());
  const sessions = new TicketSessionManager({
    store,
    createTicket: createGitHubTicketCreator(settings.githubToken),
    armTtlMs: settings.armTtlMs,
    completedRetentionMs: settings.completedRetentionMs,
  });
  sessions.startSweep();

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });

  const ctx: BotContext = {
    registry,
    sessions,
    selections: store,
    transcribe: createTranscriber(settings.openaiApiKey),
    settings,
  };

  const correlator = new DeployCorrelator({
    registry,
    sessions,
    notifier: new ChatNotifier(discordChannelResolver(client)),
    retentionMs: settings.completedRetentionMs,
  });

  client.once(Events.ClientReady, (ready) => {
    console.log(`[bot] Logged in as ${ready.user.tag}`);
  });

  client.on(Events.InteractionCreate, (interaction) => {
    handleInteraction(interaction, ctx).catch((error) => {
      console.error('[bot] Interaction failed:', error);
    });
  });

  client.on(Events.MessageCreate, (message) => {
    handleMessageCreate(message, ctx).catch((error) => {
      console.error('[bot] Message handling failed:', error);
    });
  });

  const server: ServerType = startWebhookServer(
    createWebhookApp({ correlator, secret: settings.webhook.secret }),
    settings.webhook.port,
  );

  process.on('SIGHUP', () => {
    try {
      registry.reload(resolveSettings().tables);
      console.log(`[bot] Routing reloaded: ${describeRegistry(registry)}`);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      console.error(`[bot] Reload rejected (${error.kind}): ${error.message}`);
    }
  });

  const shutdown = () => {
    console.log('[bot] Shutting down');
    sessions.stopSweep();
    server.close();
    client.destroy().finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await client.login(bot.discordToken);
}
