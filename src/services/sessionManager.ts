import type { SessionStore } from './dataStore.js';
import { sessionKey } from './dataStore.js';
import type {
  DeployEvent,
  ResolvedTarget,
  SessionState,
  TicketCreator,
  TicketSession,
} from '../types/index.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { RoutingError, TicketCreationError, errorMessage } from '../utils/errors.js';

export interface SessionManagerOptions {
  store: SessionStore;
  createTicket: TicketCreator;
  armTtlMs: number;
  completedRetentionMs: number;
  now?: () => number;
}

export type IntakeResult =
  | { ok: true; session: TicketSession }
  | { ok: false; error: RoutingError };

export type ContentResult =
  | { status: 'submitted'; session: TicketSession }
  | { status: 'expired' }
  | { status: 'not-armed'; state: SessionState };

export interface ContentInput {
  content: string;
  author: string;
}

/**
 * Ticket intake per (chat, user):
 *
 *   idle -> armed -> pending -> completed -> (idle on the next intake)
 *
 * Idle sessions are not stored. Armed expiry is a timestamp checked on every
 * locked access and by `sweep`, so no timer is kept per session.
 */
export class TicketSessionManager {
  private readonly store: SessionStore;
  private readonly createTicket: TicketCreator;
  private readonly armTtlMs: number;
  private readonly completedRetentionMs: number;
  private readonly now: () => number;
  private readonly lock = new KeyedLock();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.createTicket = options.createTicket;
    this.armTtlMs = options.armTtlMs;
    this.completedRetentionMs = options.completedRetentionMs;
    this.now = options.now ?? Date.now;
  }

  private isArmExpired(session: TicketSession, at: number): boolean {
    return session.state === 'armed' && (session.armedUntil === undefined || at >= session.armedUntil);
  }

  private isRetentionOver(session: TicketSession, at: number): boolean {
    return session.state === 'completed' && at - session.updatedAt >= this.completedRetentionMs;
  }

  /** Drops an overdue session. Must run under the key's lock. */
  private settle(chatId: string, userId: string): { session?: TicketSession; expired: boolean } {
    const session = this.store.getSession(chatId, userId);
    if (!session) return { expired: false };
    const at = this.now();
    if (this.isArmExpired(session, at)) {
      this.store.clearSession(chatId, userId);
      console.log(`[session] Intake for ${sessionKey(chatId, userId)} expired, back to idle`);
      return { expired: true };
    }
    if (this.isRetentionOver(session, at)) {
      this.store.clearSession(chatId, userId);
      return { expired: false };
    }
    return { session, expired: false };
  }

  /** Unlocked read. Overdue sessions read as idle but are left for the sweep. */
  getSession(chatId: string, userId: string): TicketSession | undefined {
    const session = this.store.getSession(chatId, userId);
    if (!session) return undefined;
    const at = this.now();
    if (this.isArmExpired(session, at) || this.isRetentionOver(session, at)) return undefined;
    return session;
  }

  getState(chatId: string, userId: string): SessionState {
    return this.getSession(chatId, userId)?.state ?? 'idle';
  }

  /**
   * Arms a session for the resolved target. With `content` the session is
   * submitted right away; a ticket-creation failure then leaves it armed.
   */
  startIntake(chatId: string, userId: string, target: ResolvedTarget, content?: ContentInput): Promise<IntakeResult> {
    return this.lock.run(sessionKey(chatId, userId), async () => {
      const { session: existing } = this.settle(chatId, userId);
      if (existing && (existing.state === 'armed' || existing.state === 'pending')) {
        return { ok: false, error: new RoutingError('SessionBusy', existing.state) };
      }

      const now = this.now();
      const armed: TicketSession = {
        chatId,
        userId,
        state: 'armed',
        resolvedRepo: target.repo,
        resolvedBranch: target.branch,
        labels: target.labels,
        armedUntil: now + this.armTtlMs,
        createdAt: now,
        updatedAt: now,
      };
      this.store.setSession(armed);

      if (content === undefined) {
        return { ok: true, session: armed };
      }
      const submitted = await this.submit(armed, content);
      return { ok: true, session: submitted };
    });
  }

  /** Content (a transcript or text) for an armed session. */
  submitContent(chatId: string, userId: string, content: ContentInput): Promise<ContentResult> {
    return this.lock.run(sessionKey(chatId, userId), async () => {
      const { session, expired } = this.settle(chatId, userId);
      if (expired) return { status: 'expired' };
      if (!session || session.state !== 'armed') {
        return { status: 'not-armed', state: session?.state ?? 'idle' };
      }
      return { status: 'submitted', session: await this.submit(session, content) };
    });
  }

  private async submit(session: TicketSession, content: ContentInput): Promise<TicketSession> {
    let ticketRef: string;
    try {
      ticketRef = await this.createTicket({
        ownerRepo: session.resolvedRepo.ownerRepo,
        branch: session.resolvedBranch,
        labels: session.labels,
        content: content.content,
        chatId: session.chatId,
        author: content.author,
      });
    } catch (error) {
      if (error instanceof TicketCreationError) throw error;
      throw new TicketCreationError(`Ticket creation failed: ${errorMessage(error)}`, { cause: error });
    }

    const pending: TicketSession = {
      ...session,
      state: 'pending',
      armedUntil: undefined,
      ticketRef,
      updatedAt: this.now(),
    };
    this.store.setSession(pending);
    console.log(`[session] ${sessionKey(session.chatId, session.userId)} pending on ${session.resolvedRepo.ownerRepo}@${session.resolvedBranch} as ${ticketRef}`);
    return pending;
  }

  /** Returns true when an armed session was discarded. */
  cancel(chatId: string, userId: string): Promise<boolean> {
    return this.lock.run(sessionKey(chatId, userId), () => {
      const { session } = this.settle(chatId, userId);
      if (!session || session.state !== 'armed') return false;
      this.store.clearSession(chatId, userId);
      return true;
    });
  }

  findSessions(state: TicketSession['state'], ownerRepo: string, branch: string): TicketSession[] {
    return this.store
      .listSessions()
      .filter((s) => s.state === state && s.resolvedRepo.ownerRepo === ownerRepo && s.resolvedBranch === branch)
      .filter((s) => this.getSession(s.chatId, s.userId) !== undefined);
  }

  /**
   * Completes a pending session if it still carries `ticketRef`. `beforeCommit`
   * runs under the session's lock; when it throws the session stays pending.
   */
  complete(
    chatId: string,
    userId: string,
    ticketRef: string,
    event: DeployEvent,
    beforeCommit: (session: TicketSession) => Promise<void>,
  ): Promise<TicketSession | undefined> {
    return this.lock.run(sessionKey(chatId, userId), async () => {
      const { session } = this.settle(chatId, userId);
      if (!session || session.state !== 'pending' || session.ticketRef !== ticketRef) return undefined;
      await beforeCommit(session);
      const completed: TicketSession = {
        ...session,
        state: 'completed',
        buildUrl: event.buildUrl,
        deployStatus: event.status,
        updatedAt: this.now(),
      };
      this.store.setSession(completed);
      return completed;
    });
  }

  /** Expires overdue armed sessions and evicts old completed ones. */
  async sweep(): Promise<number> {
    const at = this.now();
    const due = this.store
      .listSessions()
      .filter((s) => this.isArmExpired(s, at) || this.isRetentionOver(s, at));
    const results = await Promise.all(
      due.map((s) => this.lock.run(sessionKey(s.chatId, s.userId), () => this.settle(s.chatId, s.userId))),
    );
    return results.filter((r) => r.expired).length;
  }

  startSweep(intervalMs: number = 5000): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error) => {
        console.error('[session] Sweep failed:', error);
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
