import type { RegistryHolder } from './registry.js';
import type { TicketSessionManager } from './sessionManager.js';
import type { SelectionStore } from './dataStore.js';
import type { Transcriber } from './transcriptionService.js';
import type { RuntimeSettings } from './configStore.js';
import { resolveTarget, type ResolveResult } from './router.js';

export interface BotContext {
  registry: RegistryHolder;
  sessions: TicketSessionManager;
  selections: SelectionStore;
  transcribe: Transcriber;
  settings: RuntimeSettings;
}

/**
 * Resolves the target for a chat/user, using the stored `/repo` selection
 * when the command names no repository itself.
 */
export function resolveForUser(ctx: BotContext, chatId: string, userId: string, explicitShortName?: string | null): ResolveResult {
  return resolveTarget(ctx.registry.current(), {
    chatId,
    userId,
    explicitShortName: explicitShortName ?? ctx.selections.getSelection(chatId, userId),
    defaultLabels: ctx.settings.defaultLabels,
  });
}
