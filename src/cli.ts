#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { startBot } from './bot.js';
import { runSetupWizard } from './setup/wizard.js';
import { deployCommands } from './setup/deploy.js';
import { resolveSettings } from './services/configStore.js';
import { loadRegistry } from './services/registry.js';
import { ConfigError, errorMessage } from './utils/errors.js';

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(pc.red(`Configuration error (${error.kind}): ${error.message}`));
  } else {
    console.error(pc.red(`Error: ${errorMessage(error)}`));
  }
  process.exit(1);
}

const program = new Command();

program
  .name('deploy-ticket-bot')
  .description('Voice and text tickets from Discord, correlated with branch preview deploys');

program
  .command('start')
  .description('Start the bot and the deploy webhook server')
  .action(async () => {
    await startBot().catch(fail);
  });

program
  .command('setup')
  .description('Configure the Discord bot credentials')
  .action(async () => {
    await runSetupWizard().catch(fail);
  });

program
  .command('deploy')
  .description('Register slash commands with Discord')
  .action(async () => {
    await deployCommands().catch(fail);
  });

program
  .command('check-config')
  .description('Validate the routing tables')
  .action(() => {
    try {
      const settings = resolveSettings();
      const snapshot = loadRegistry(settings.tables);
      const c = snapshot.counts();
      console.log(pc.green('Routing tables are valid.'));
      console.log(`  repositories: ${c.repos}`);
      console.log(`  developers:   ${c.developers}`);
      console.log(`  sites:        ${c.sites}`);
      console.log(`  chats:        ${c.chats}`);
      console.log(`  arm TTL:      ${settings.armTtlMs / 1000}s`);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
