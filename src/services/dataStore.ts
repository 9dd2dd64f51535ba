import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { DataStore, RepoSelection, TicketSession } from '../types/index.js';
import { getConfigDir } from './configStore.js';

const TicketSessionSchema = z.object({
  chatId: z.string(),
  userId: z.string(),
  state: z.enum(['armed', 'pending', 'completed']),
  resolvedRepo: z.object({ ownerRepo: z.string(), shortName: z.string(), defaultBranch: z.string() }),
  resolvedBranch: z.string(),
  labels: z.array(z.string()),
  armedUntil: z.number().optional(),
  ticketRef: z.string().optional(),
  buildUrl: z.string().optional(),
  deployStatus: z.enum(['succeeded', 'failed']).optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const DataStoreSchema = z.object({
  sessions: z.array(TicketSessionSchema).default([]),
  selections: z.array(z.object({ chatId: z.string(), userId: z.string(), shortName: z.string() })).default([]),
});

export interface SessionStore {
  getSession(chatId: string, userId: string): TicketSession | undefined;
  setSession(session: TicketSession): void;
  clearSession(chatId: string, userId: string): void;
  listSessions(): TicketSession[];
}

export interface SelectionStore {
  getSelection(chatId: string, userId: string): string | undefined;
  setSelection(selection: RepoSelection): void;
  clearSelection(chatId: string, userId: string): void;
}

export function sessionKey(chatId: string, userId: string): string {
  return `${chatId}:${userId}`;
}

/**
 * In-memory tables backed by a JSON file. Every mutation is written through
 * before it returns, so an acknowledged intake survives a restart.
 */
export class JsonDataStore implements SessionStore, SelectionStore {
  private sessions = new Map<string, TicketSession>();
  private selections = new Map<string, RepoSelection>();

  constructor(private readonly filePath: string | null) {
    if (filePath) this.load(filePath);
  }

  private load(filePath: string): void {
    if (!existsSync(filePath)) return;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      console.error(`[store] Ignoring unreadable data file ${filePath}:`, error);
      return;
    }
    const parsed = DataStoreSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[store] Ignoring invalid data file ${filePath}:`, parsed.error.message);
      return;
    }
    const data: DataStore = parsed.data;
    for (const session of data.sessions) {
      this.sessions.set(sessionKey(session.chatId, session.userId), session);
    }
    for (const selection of data.selections) {
      this.selections.set(sessionKey(selection.chatId, selection.userId), selection);
    }
  }

  private save(): void {
    if (!this.filePath) return;
    const data: DataStore = {
      sessions: Array.from(this.sessions.values()),
      selections: Array.from(this.selections.values()),
    };
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    renameSync(tmp, this.filePath);
  }

  getSession(chatId: string, userId: string): TicketSession | undefined {
    return this.sessions.get(sessionKey(chatId, userId));
  }

  setSession(session: TicketSession): void {
    this.sessions.set(sessionKey(session.chatId, session.userId), session);
    this.save();
  }

  clearSession(chatId: string, userId: string): void {
    if (this.sessions.delete(sessionKey(chatId, userId))) {
      this.save();
    }
  }

  listSessions(): TicketSession[] {
    return Array.from(this.sessions.values());
  }

  getSelection(chatId: string, userId: string): string | undefined {
    return this.selections.get(sessionKey(chatId, userId))?.shortName;
  }

  setSelection(selection: RepoSelection): void {
    this.selections.set(sessionKey(selection.chatId, selection.userId), selection);
    this.save();
  }

  clearSelection(chatId: string, userId: string): void {
    if (this.selections.delete(sessionKey(chatId, userId))) {
      this.save();
    }
  }
}

export function getDataFilePath(): string {
  return join(getConfigDir(), 'data.json');
}

export function createMemoryStore(): JsonDataStore {
  return new JsonDataStore(null);
}
