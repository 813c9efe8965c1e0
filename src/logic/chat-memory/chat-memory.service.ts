import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AppConfig } from '../../config/env.validation';
import { InvariantViolationError, errorMessage } from '../../utils/errors';
import { KeyedLock } from '../../utils/keyedLock';
import { Session, Turn } from '../../utils/types';

export const SESSION_STORE = Symbol('SESSION_STORE');
export type SessionStore = Map<string, Session>;

const IDLE_SWEEP_INTERVAL = 'chat-memory-idle-sweep';
const MAX_SWEEP_PERIOD_MS = 60_000;

/**
 * Per-user conversation memory. Each session keeps the last `MEMORY_WINDOW`
 * turns, oldest first. Operations on the same user run one at a time; users
 * never wait on each other.
 *
 * Sessions live only in the injected store and are gone after a restart.
 */
@Injectable()
export class ChatMemoryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ChatMemoryService.name);
  private readonly lock = new KeyedLock();
  private readonly window: number;
  private readonly maxSessions: number;
  private readonly idleMs: number;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    configService: ConfigService<AppConfig, true>,
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
    @Optional() private readonly schedulerRegistry?: SchedulerRegistry,
  ) {
    this.window = configService.get('MEMORY_WINDOW', { infer: true });
    this.maxSessions = configService.get('MEMORY_MAX_SESSIONS', { infer: true });
    this.idleMs = configService.get('MEMORY_SESSION_IDLE_MINUTES', { infer: true }) * 60_000;
  }

  get windowSize(): number {
    return this.window;
  }

  onModuleInit() {
    if (this.idleMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdle().catch(err => this.logger.error(`Idle session sweep failed: ${errorMessage(err)}`));
    }, Math.min(this.idleMs, MAX_SWEEP_PERIOD_MS));
    this.sweepTimer.unref();
    this.schedulerRegistry?.addInterval(IDLE_SWEEP_INTERVAL, this.sweepTimer);
  }

  onModuleDestroy() {
    if (this.sweepTimer) {
      if (this.schedulerRegistry?.doesExist('interval', IDLE_SWEEP_INTERVAL)) {
        this.schedulerRegistry.deleteInterval(IDLE_SWEEP_INTERVAL);
      }
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    this.sessions.clear();
  }

  async append(userId: string, turn: Turn): Promise<void> {
    await this.lock.run(userId, () => {
      const now = new Date();
      let session = this.sessions.get(userId);
      if (!session) {
        session = { userId, turns: [], createdAt: now, lastActiveAt: now };
        this.sessions.set(userId, session);
        this.enforceSessionCap(userId);
      }

      const last = session.turns[session.turns.length - 1];
      if (last && turn.createdAt.getTime() < last.createdAt.getTime()) {
        throw new InvariantViolationError(
          `turn ${turn.id} for ${userId} predates the latest stored turn ${last.id}`,
        );
      }

      session.turns.push(turn);
      if (session.turns.length > this.window) {
        session.turns.splice(0, session.turns.length - this.window);
      }
      session.lastActiveAt = now;
    });
  }

  /** Up to `maxTurns` most recent turns, oldest first. Never more than the window. */
  async recent(userId: string, maxTurns: number = this.window): Promise<Turn[]> {
    return this.lock.run(userId, () => {
      const session = this.sessions.get(userId);
      const n = Math.min(Math.max(0, Math.floor(maxTurns)), this.window);
      if (!session || n === 0) return [];
      session.lastActiveAt = new Date();
      return session.turns.slice(-n).map(turn => ({ ...turn, sources: [...turn.sources] }));
    });
  }

  async clear(userId: string): Promise<boolean> {
    return this.lock.run(userId, () => this.sessions.delete(userId));
  }

  /** Drops sessions idle for longer than the configured limit. */
  async sweepIdle(now: Date = new Date()): Promise<number> {
    if (this.idleMs <= 0) return 0;
    const cutoff = now.getTime() - this.idleMs;
    const stale = [...this.sessions.values()]
      .filter(session => session.lastActiveAt.getTime() < cutoff)
      .map(session => session.userId);

    let removed = 0;
    for (const userId of stale) {
      const dropped = await this.lock.run(userId, () => {
        const session = this.sessions.get(userId);
        if (!session || session.lastActiveAt.getTime() >= cutoff) return false;
        return this.sessions.delete(userId);
      });
      if (dropped) removed++;
    }
    if (removed > 0) {
      this.logger.log(`Expired ${removed} idle session(s)`);
    }
    return removed;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // Store operations never await, so removing another user's session here
  // cannot interleave with that user's own locked task.
  private enforceSessionCap(keep: string) {
    if (this.maxSessions <= 0) return;
    while (this.sessions.size > this.maxSessions) {
      let oldest: Session | undefined;
      for (const session of this.sessions.values()) {
        if (session.userId === keep) continue;
        if (!oldest || session.lastActiveAt.getTime() < oldest.lastActiveAt.getTime()) {
          oldest = session;
        }
      }
      if (!oldest) return;
      this.sessions.delete(oldest.userId);
      this.logger.debug(`Evicted session ${oldest.userId} to stay within ${this.maxSessions} sessions`);
    }
  }
}
