import { vi } from 'vitest';
import { loadRegistry, RegistryHolder } from '../services/registry.js';
import { createMemoryStore } from '../services/dataStore.js';
import { TicketSessionManager } from '../services/sessionManager.js';
import type { RawTables, TicketCreator } from '../types/index.js';

export const MAHJONG_TABLES: RawTables = {
  repos: 'Owner/mahjong-core:mj:dev/Gleb',
  developers: '42692410:dev/Gleb:developer:Gleb',
  sites: 'mahjong-dev-gleb:Owner/mahjong-core',
};

export class FakeClock {
  constructor(public value: number = 1_000_000) {}
  now = (): number => this.value;
  advance(ms: number): void {
    this.value += ms;
  }
}

export function createHarness(options: { tables?: RawTables; armTtlMs?: number; retentionMs?: number } = {}) {
  const clock = new FakeClock();
  const store = createMemoryStore();
  let ticketCount = 0;
  const createTicket = vi.fn<TicketCreator>(async () => `T${++ticketCount}`);
  const registry = new RegistryHolder(loadRegistry(options.tables ?? MAHJONG_TABLES));
  const sessions = new TicketSessionManager({
    store,
    createTicket,
    armTtlMs: options.armTtlMs ?? 120_000,
    completedRetentionMs: options.retentionMs ?? 3_600_000,
    now: clock.now,
  });
  return { clock, store, createTicket, registry, sessions };
}
