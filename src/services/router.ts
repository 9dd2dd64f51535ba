import type { RegistrySnapshot } from './registry.js';
import type { RepoBinding, ResolvedTarget } from '../types/index.js';
import { RoutingError } from '../utils/errors.js';

export type ResolveResult =
  | { ok: true; target: ResolvedTarget }
  | { ok: false; error: RoutingError };

export interface ResolveInput {
  chatId: string;
  userId: string;
  explicitShortName?: string;
  /** Labels added to every ticket on top of the developer label. */
  defaultLabels?: readonly string[];
}

function withLabels(repo: RepoBinding, branch: string, developerLabel: string | undefined, defaults: readonly string[]): ResolvedTarget {
  const labels = developerLabel ? [developerLabel, ...defaults] : [...defaults];
  return { repo, branch, labels: Array.from(new Set(labels)) };
}

function chatRepo(snapshot: RegistrySnapshot, chatId: string): RepoBinding | undefined {
  const chat = snapshot.byChatId(chatId);
  if (!chat.found) return undefined;
  const repo = snapshot.byOwnerRepo(chat.binding.ownerRepo);
  return repo.found ? repo.binding : undefined;
}

/**
 * Picks repository, branch and labels for a chat/user pair. Pure over the
 * snapshot: the same input always yields the same target, which is what lets
 * the deploy correlator match on repository + branch later.
 *
 * Order: explicit short name, developer binding, chat binding, single repo.
 */
export function resolveTarget(snapshot: RegistrySnapshot, input: ResolveInput): ResolveResult {
  const defaults = input.defaultLabels ?? [];
  const developer = snapshot.byUserId(input.userId);
  const devBinding = developer.found ? developer.binding : undefined;

  if (input.explicitShortName) {
    const repo = snapshot.byShortName(input.explicitShortName);
    if (!repo.found) {
      return { ok: false, error: new RoutingError('UnknownRepo', input.explicitShortName) };
    }
    const branch = devBinding?.branch ?? repo.binding.defaultBranch;
    return { ok: true, target: withLabels(repo.binding, branch, devBinding?.label, defaults) };
  }

  const repositories = snapshot.repositories();

  if (devBinding) {
    const repo = chatRepo(snapshot, input.chatId) ?? (repositories.length === 1 ? repositories[0] : undefined);
    if (!repo) {
      return {
        ok: false,
        error: repositories.length > 1
          ? new RoutingError('AmbiguousRepo')
          : new RoutingError('NoTargetResolved'),
      };
    }
    return { ok: true, target: withLabels(repo, devBinding.branch, devBinding.label, defaults) };
  }

  const bound = chatRepo(snapshot, input.chatId);
  if (bound) {
    return { ok: true, target: withLabels(bound, bound.defaultBranch, undefined, defaults) };
  }

  if (repositories.length === 1) {
    const [only] = repositories;
    return { ok: true, target: withLabels(only, only.defaultBranch, undefined, defaults) };
  }

  return { ok: false, error: new RoutingError('NoTargetResolved') };
}
