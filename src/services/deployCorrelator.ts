import type { RegistryHolder } from './registry.js';
import type { TicketSessionManager } from './sessionManager.js';
import type { DeployEvent, NotificationPlan, Notifier, TicketSession } from '../types/index.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { NotificationError, errorMessage } from '../utils/errors.js';

export type IgnoreReason = 'UnknownSite' | 'NoMatchingSession' | 'AlreadyCompleted';

export type CorrelationOutcome =
  | { kind: 'notified'; plan: NotificationPlan; session: TicketSession }
  | { kind: 'ignored'; reason: IgnoreReason };

export interface DeployCorrelatorOptions {
  registry: RegistryHolder;
  sessions: TicketSessionManager;
  notifier: Notifier;
  /** How long a delivered build stays recognisable as a duplicate. */
  retentionMs: number;
  now?: () => number;
}

function branchKey(ownerRepo: string, branch: string): string {
  return `${ownerRepo}|${branch}`;
}

interface Delivery {
  buildUrl: string;
  at: number;
}

/** Most recently updated first; ties fall back to creation time, then key. */
function byRecency(a: TicketSession, b: TicketSession): number {
  return (
    b.updatedAt - a.updatedAt ||
    b.createdAt - a.createdAt ||
    `${a.chatId}:${a.userId}`.localeCompare(`${b.chatId}:${b.userId}`)
  );
}

/**
 * Matches deploy webhooks to pending tickets. A deploy site only identifies a
 * repository, so a match is repository + branch; when several developers are
 * pending on the same pair the most recently updated session wins.
 *
 * Events for one repository + branch are processed one at a time, which keeps
 * scan and transition atomic against other deliveries for the same pair.
 */
export class DeployCorrelator {
  private readonly registry: RegistryHolder;
  private readonly sessions: TicketSessionManager;
  private readonly notifier: Notifier;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly lock = new KeyedLock();
  private readonly delivered = new Map<string, Delivery[]>();

  constructor(options: DeployCorrelatorOptions) {
    this.registry = options.registry;
    this.sessions = options.sessions;
    this.notifier = options.notifier;
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  async onDeployEvent(event: DeployEvent): Promise<CorrelationOutcome> {
    const site = this.registry.current().bySiteName(event.siteName);
    if (!site.found) {
      return this.ignore(event, 'UnknownSite');
    }
    const { ownerRepo } = site.binding;
    return this.lock.run(branchKey(ownerRepo, event.branch), () => this.correlate(ownerRepo, event));
  }

  private pruneDelivered(at: number): void {
    for (const [key, deliveries] of this.delivered) {
      const kept = deliveries.filter((d) => at - d.at < this.retentionMs);
      if (kept.length === 0) this.delivered.delete(key);
      else this.delivered.set(key, kept);
    }
  }

  /** A build already attached to a completed ticket on this repository + branch. */
  private isDelivered(ownerRepo: string, event: DeployEvent): boolean {
    const recorded = this.delivered.get(branchKey(ownerRepo, event.branch)) ?? [];
    return (
      recorded.some((d) => d.buildUrl === event.buildUrl) ||
      this.sessions
        .findSessions('completed', ownerRepo, event.branch)
        .some((s) => s.buildUrl === event.buildUrl)
    );
  }

  private async correlate(ownerRepo: string, event: DeployEvent): Promise<CorrelationOutcome> {
    this.pruneDelivered(this.now());

    const candidates = this.sessions.findSessions('pending', ownerRepo, event.branch).sort(byRecency);
    const [match] = candidates;
    if (!match || match.ticketRef === undefined) {
      return this.ignore(event, this.isDelivered(ownerRepo, event) ? 'AlreadyCompleted' : 'NoMatchingSession');
    }
    if (candidates.length > 1) {
      console.log(`[correlator] ${candidates.length} pending sessions on ${ownerRepo}@${event.branch}, taking the latest`);
    }

    const plan: NotificationPlan = {
      chatId: match.chatId,
      userId: match.userId,
      ticketRef: match.ticketRef,
      status: event.status,
      buildUrl: event.buildUrl,
      ownerRepo,
      branch: event.branch,
    };

    const completed = await this.sessions.complete(match.chatId, match.userId, match.ticketRef, event, async () => {
      try {
        await this.notifier.notify(plan);
      } catch (error) {
        throw new NotificationError(`Notification for ${plan.ticketRef} failed: ${errorMessage(error)}`, { cause: error });
      }
    });
    if (!completed) {
      return this.ignore(event, 'NoMatchingSession');
    }

    const key = branchKey(ownerRepo, event.branch);
    this.delivered.set(key, [
      ...(this.delivered.get(key) ?? []),
      { buildUrl: event.buildUrl, at: this.now() },
    ]);
    console.log(`[correlator] ${event.siteName} ${event.status} completed ${plan.ticketRef}`);
    return { kind: 'notified', plan, session: completed };
  }

  private ignore(event: DeployEvent, reason: IgnoreReason): CorrelationOutcome {
    console.log(`[correlator] Ignored ${event.siteName}@${event.branch}: ${reason}`);
    return { kind: 'ignored', reason };
  }
}
