import * as p from '@clack/prompts';
import pc from 'picocolors';
import { setBotConfig, getBotConfig, hasBotConfig, loadConfig, saveConfig } from '../services/configStore.js';
import { loadRegistry } from '../services/registry.js';
import { ConfigError } from '../utils/errors.js';
import { deployCommands } from './deploy.js';

const DISCORD_DEV_URL = 'https://discord.com/developers/applications';

function validateApplicationId(value: string): string | undefined {
  if (!value) return 'Application ID is required';
  if (!/^\d{17,20}$/.test(value)) return 'Invalid format (should be 17-20 digits)';
  return undefined;
}

function validateToken(value: string): string | undefined {
  if (!value) return 'Bot token is required';
  if (value.length < 50) return 'Invalid token format (too short)';
  return undefined;
}

function validateGuildId(value: string): string | undefined {
  if (!value) return 'Guild ID is required';
  if (!/^\d{17,20}$/.test(value)) return 'Invalid format (should be 17-20 digits)';
  return undefined;
}

function validateRepoTable(value: string): string | undefined {
  if (!value) return 'At least one repository is required';
  try {
    loadRegistry({ repos: value });
    return undefined;
  } catch (error) {
    return error instanceof ConfigError ? error.message : String(error);
  }
}

function cancelled(): never {
  p.cancel('Setup cancelled.');
  process.exit(0);
}

export async function runSetupWizard(): Promise<void> {
  console.clear();

  p.intro(pc.bgCyan(pc.black(' deploy-ticket-bot setup ')));

  const existing = getBotConfig();
  if (hasBotConfig() && existing) {
    const overwrite = await p.confirm({
      message: `Bot already configured (Client ID: ${existing.clientId}). Reconfigure?`,
      initialValue: false,
    });

    if (p.isCancel(overwrite) || !overwrite) {
      p.outro('Setup cancelled.');
      return;
    }
  }

  p.note(
    `1. Go to ${pc.cyan(DISCORD_DEV_URL)}\n` +
    `2. Click ${pc.bold('"New Application"')} and name it\n` +
    `3. Copy the ${pc.bold('Application ID')} from "General Information"\n` +
    `4. Under ${pc.bold('"Bot"')}, enable ${pc.green('MESSAGE CONTENT INTENT')}`,
    'Step 1: Create Discord Application'
  );

  const clientId = await p.text({
    message: 'Enter your Discord Application ID:',
    placeholder: 'e.g., 1234567890123456789',
    validate: validateApplicationId,
  });
  if (p.isCancel(clientId)) cancelled();

  const discordToken = await p.password({
    message: 'Enter your Discord Bot Token:',
    validate: validateToken,
  });
  if (p.isCancel(discordToken)) cancelled();

  const guildId = await p.text({
    message: 'Enter your Discord Guild (Server) ID:',
    placeholder: 'e.g., 1234567890123456789',
    validate: validateGuildId,
  });
  if (p.isCancel(guildId)) cancelled();

  p.note(
    `Format: ${pc.cyan('owner/repo:short:branch')}, comma-separated.\n` +
    `Developers, sites and chats are read from ${pc.bold('TICKET_DEVELOPERS')}, ` +
    `${pc.bold('TICKET_SITES')} and ${pc.bold('TICKET_CHATS')}.`,
    'Step 2: Repositories'
  );

  const repos = await p.text({
    message: 'Repository table:',
    placeholder: 'acme/webapp:web:main',
    initialValue: loadConfig().routing?.repos ?? '',
    validate: validateRepoTable,
  });
  if (p.isCancel(repos)) cancelled();

  const s = p.spinner();
  s.start('Saving configuration...');

  setBotConfig({ discordToken, clientId, guildId });
  const config = loadConfig();
  config.routing = { ...config.routing, repos };
  saveConfig(config);

  s.stop('Configuration saved!');

  const inviteUrl = `https://discord.com/api/oauth2/authorize?client_id=${clientId}&permissions=2147534848&scope=bot`;
  p.note(
    `Open this URL in your browser:\n\n${pc.cyan(inviteUrl)}\n\n` +
    `Select your server and authorize the bot.`,
    'Step 3: Invite Bot to Server'
  );

  const shouldDeploy = await p.confirm({
    message: 'Deploy slash commands now?',
    initialValue: true,
  });

  if (!p.isCancel(shouldDeploy) && shouldDeploy) {
    s.start('Deploying slash commands...');
    try {
      await deployCommands();
      s.stop('Slash commands deployed!');
    } catch (error) {
      s.stop('Failed to deploy commands');
      console.error(pc.red(`Error: ${error instanceof Error ? error.message : error}`));
    }
  }

  p.outro(pc.green('Setup complete! Run "deploy-ticket-bot start" to start the bot.'));
}
