import type {
  ChatBinding,
  DeveloperBinding,
  Lookup,
  RawTables,
  RepoBinding,
  SiteBinding,
} from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

function splitEntries(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Splits an entry on colons. With `restJoined` the trailing fields are joined
 * back, so a developer label may itself contain colons.
 */
function splitFields(entry: string, arity: number, restJoined = false): string[] {
  const parts = entry.split(':').map((part) => part.trim());
  if (restJoined ? parts.length < arity : parts.length !== arity) {
    throw new ConfigError('MalformedEntry', entry, `Expected ${arity} fields in "${entry}", got ${parts.length}`);
  }
  const fields = restJoined
    ? [...parts.slice(0, arity - 1), parts.slice(arity - 1).join(':')]
    : parts;
  if (fields.some((field) => field.length === 0)) {
    throw new ConfigError('MalformedEntry', entry, `Empty field in "${entry}"`);
  }
  return fields;
}

function checkOwnerRepo(ownerRepo: string, entry: string): void {
  const [owner, repo, ...extra] = ownerRepo.split('/');
  if (!owner || !repo || extra.length > 0) {
    throw new ConfigError('MalformedEntry', entry, `"${ownerRepo}" is not an owner/repo pair`);
  }
}

function sameBinding<T extends object>(a: T, b: T): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function insertUnique<T extends object>(table: Map<string, T>, key: string, binding: T, entry: string): void {
  const existing = table.get(key);
  if (existing === undefined) {
    table.set(key, binding);
    return;
  }
  if (!sameBinding(existing, binding)) {
    throw new ConfigError('DuplicateKey', entry, `Conflicting entries for "${key}"`);
  }
}

function found<T>(binding: T | undefined): Lookup<T> {
  return binding === undefined ? { found: false } : { found: true, binding };
}

/**
 * Immutable view over the routing tables. Build one with `loadRegistry`;
 * reloads produce a new snapshot rather than mutating this one.
 */
export class RegistrySnapshot {
  private readonly repos: ReadonlyMap<string, RepoBinding>;
  private readonly reposByOwner: ReadonlyMap<string, RepoBinding>;
  private readonly developers: ReadonlyMap<string, DeveloperBinding>;
  private readonly sites: ReadonlyMap<string, SiteBinding>;
  private readonly chats: ReadonlyMap<string, ChatBinding>;

  constructor(tables: {
    repos: Map<string, RepoBinding>;
    developers: Map<string, DeveloperBinding>;
    sites: Map<string, SiteBinding>;
    chats: Map<string, ChatBinding>;
  }) {
    this.repos = tables.repos;
    this.developers = tables.developers;
    this.sites = tables.sites;
    this.chats = tables.chats;

    const byOwner = new Map<string, RepoBinding>();
    for (const repo of tables.repos.values()) {
      if (!byOwner.has(repo.ownerRepo)) byOwner.set(repo.ownerRepo, repo);
    }
    this.reposByOwner = byOwner;
  }

  byShortName(shortName: string): Lookup<RepoBinding> {
    return found(this.repos.get(shortName));
  }

  byOwnerRepo(ownerRepo: string): Lookup<RepoBinding> {
    return found(this.reposByOwner.get(ownerRepo));
  }

  byUserId(userId: string): Lookup<DeveloperBinding> {
    return found(this.developers.get(userId));
  }

  bySiteName(siteName: string): Lookup<SiteBinding> {
    return found(this.sites.get(siteName));
  }

  byChatId(chatId: string): Lookup<ChatBinding> {
    return found(this.chats.get(chatId));
  }

  /** Distinct repositories in table order, aliases collapsed. */
  repositories(): RepoBinding[] {
    return Array.from(this.reposByOwner.values());
  }

  counts(): { repos: number; developers: number; sites: number; chats: number } {
    return {
      repos: this.repos.size,
      developers: this.developers.size,
      sites: this.sites.size,
      chats: this.chats.size,
    };
  }
}

export function loadRegistry(raw: RawTables): RegistrySnapshot {
  const repos = new Map<string, RepoBinding>();
  const branchByOwner = new Map<string, string>();
  for (const entry of splitEntries(raw.repos)) {
    const [ownerRepo, shortName, defaultBranch] = splitFields(entry, 3);
    checkOwnerRepo(ownerRepo, entry);
    const knownBranch = branchByOwner.get(ownerRepo);
    if (knownBranch !== undefined && knownBranch !== defaultBranch) {
      throw new ConfigError('DuplicateKey', entry, `"${ownerRepo}" is configured with branches "${knownBranch}" and "${defaultBranch}"`);
    }
    branchByOwner.set(ownerRepo, defaultBranch);
    insertUnique(repos, shortName, { ownerRepo, shortName, defaultBranch }, entry);
  }

  const developers = new Map<string, DeveloperBinding>();
  for (const entry of splitEntries(raw.developers)) {
    const [userId, branch, label] = splitFields(entry, 3, true);
    insertUnique(developers, userId, { userId, branch, label }, entry);
  }

  const sites = new Map<string, SiteBinding>();
  for (const entry of splitEntries(raw.sites)) {
    const [siteName, ownerRepo] = splitFields(entry, 2);
    if (!branchByOwner.has(ownerRepo)) {
      throw new ConfigError('DanglingReference', entry, `Site "${siteName}" points at unknown repository "${ownerRepo}"`);
    }
    insertUnique(sites, siteName, { siteName, ownerRepo }, entry);
  }

  const chats = new Map<string, ChatBinding>();
  for (const entry of splitEntries(raw.chats)) {
    const [chatId, ownerRepo] = splitFields(entry, 2);
    if (!branchByOwner.has(ownerRepo)) {
      throw new ConfigError('DanglingReference', entry, `Chat "${chatId}" points at unknown repository "${ownerRepo}"`);
    }
    insertUnique(chats, chatId, { chatId, ownerRepo }, entry);
  }

  return new RegistrySnapshot({ repos, developers, sites, chats });
}

/**
 * Holds the current snapshot. Callers read `current()` once per operation so
 * a concurrent reload never mixes two snapshots inside one resolution.
 */
export class RegistryHolder {
  private snapshot: RegistrySnapshot;

  constructor(initial: RegistrySnapshot) {
    this.snapshot = initial;
  }

  current(): RegistrySnapshot {
    return this.snapshot;
  }

  /** Throws ConfigError and keeps the previous snapshot when the tables are invalid. */
  reload(raw: RawTables): RegistrySnapshot {
    const next = loadRegistry(raw);
    this.snapshot = next;
    return next;
  }
}
