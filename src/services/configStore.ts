import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { RawTables } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

export interface BotConfig {
  discordToken: string;
  clientId: string;
  guildId: string;
}

export interface RoutingConfig extends RawTables {
  armTtlSeconds?: number;
  completedRetentionSeconds?: number;
  labels?: string;
  requireTicketCommand?: boolean;
}

export interface WebhookConfig {
  port: number;
  secret?: string;
}

export interface AppConfig {
  bot?: BotConfig;
  routing?: RoutingConfig;
  webhook?: Partial<WebhookConfig>;
}

export interface RuntimeSettings {
  tables: RawTables;
  armTtlMs: number;
  completedRetentionMs: number;
  defaultLabels: string[];
  requireTicketCommand: boolean;
  webhook: WebhookConfig;
  githubToken?: string;
  openaiApiKey?: string;
}

const CONFIG_DIR = process.env.DEPLOY_TICKET_BOT_HOME ?? join(homedir(), '.deploy-ticket-bot');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

const DEFAULT_ARM_TTL_SECONDS = 120;
const DEFAULT_RETENTION_SECONDS = 24 * 60 * 60;
const DEFAULT_WEBHOOK_PORT = 8787;

function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function loadConfig(): AppConfig {
  ensureConfigDir();
  if (!existsSync(CONFIG_FILE)) {
    return {};
  }
  try {
    const content = readFileSync(CONFIG_FILE, 'utf-8');
    return JSON.parse(content) as AppConfig;
  } catch (error) {
    console.error(`[config] Could not read ${CONFIG_FILE}:`, error);
    return {};
  }
}

export function saveConfig(config: AppConfig): void {
  ensureConfigDir();
  writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2), 'utf-8');
}

export function getBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig | undefined {
  const stored = loadConfig().bot;
  const discordToken = env.DISCORD_TOKEN ?? stored?.discordToken;
  const clientId = env.DISCORD_CLIENT_ID ?? stored?.clientId;
  const guildId = env.DISCORD_GUILD_ID ?? stored?.guildId;
  if (!discordToken || !clientId || !guildId) return undefined;
  return { discordToken, clientId, guildId };
}

export function setBotConfig(bot: BotConfig): void {
  const config = loadConfig();
  config.bot = bot;
  saveConfig(config);
}

export function hasBotConfig(): boolean {
  return getBotConfig() !== undefined;
}

function parsePositiveInt(name: string, value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError('MalformedEntry', String(value), `${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseBool(value: string | boolean | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  if (typeof value === 'boolean') return value;
  return ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase());
}

export function parseLabels(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Merges the `routing` section of the config file with the environment.
 * Environment values win.
 */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env, file: AppConfig = loadConfig()): RuntimeSettings {
  const routing = file.routing ?? {};
  return {
    tables: {
      repos: env.TICKET_REPOS ?? routing.repos,
      developers: env.TICKET_DEVELOPERS ?? routing.developers,
      sites: env.TICKET_SITES ?? routing.sites,
      chats: env.TICKET_CHATS ?? routing.chats,
    },
    armTtlMs: parsePositiveInt('ARM_TTL_SECONDS', env.ARM_TTL_SECONDS ?? routing.armTtlSeconds, DEFAULT_ARM_TTL_SECONDS) * 1000,
    completedRetentionMs: parsePositiveInt(
      'COMPLETED_RETENTION_SECONDS',
      env.COMPLETED_RETENTION_SECONDS ?? routing.completedRetentionSeconds,
      DEFAULT_RETENTION_SECONDS,
    ) * 1000,
    defaultLabels: parseLabels(env.TICKET_LABELS ?? routing.labels),
    requireTicketCommand: parseBool(env.REQUIRE_TICKET_COMMAND ?? routing.requireTicketCommand, true),
    webhook: {
      port: parsePositiveInt('WEBHOOK_PORT', env.WEBHOOK_PORT ?? file.webhook?.port, DEFAULT_WEBHOOK_PORT),
      secret: env.WEBHOOK_SECRET ?? file.webhook?.secret,
    },
    githubToken: env.GITHUB_TOKEN,
    openaiApiKey: env.OPENAI_API_KEY,
  };
}
