// Conversation memory - per-user sessions, recent turns and summaries
//
// Each user moves NoSession -> ActiveSession -> NoSession. Turns go into a
// bounded ring buffer and are folded into the session digest on arrival;
// closing a session persists its digest as an immutable summary.
//
// Mutations take a per-user lock. Persistence always happens after the
// lock is released.

import type {
  ConversationTurn,
  Id,
  MemoryEnhancement,
  SessionDigest,
  SessionSummary,
} from '@huddle/protocol';
import type { SessionSummaryRepository } from '@huddle/repositories';
import type { Logger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import {
  DEFAULT_MAX_TURNS_PER_USER,
  DEFAULT_RECENT_TURNS_IN_CONTEXT,
  DEFAULT_SESSION_IDLE_TIMEOUT_MS,
} from '../config.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { RingBuffer } from './ring-buffer.js';
import { assessExpertise, emptyDigest, foldTurn } from './digest.js';
import { extractTopics } from './topics.js';

/** Responses handed back in recent turns are clipped to this length */
export const RECENT_RESPONSE_LIMIT = 200;

export const MAX_PREFERRED_TOPICS = 5;

/** Summaries consulted when enhancing a request */
const SUMMARY_LOOKBACK = 20;

/**
 * What the caller supplies for a new turn. Identity, topics and the
 * timestamp are filled in by memory unless given.
 */
export type NewTurn = Omit<ConversationTurn, 'userId' | 'sessionId' | 'topics' | 'timestamp'> & {
  timestamp?: number;
  topics?: string[];
};

export type ConversationMemoryOptions = {
  summaries: SessionSummaryRepository;

  /** Ring buffer bound per user (default: 10) */
  maxTurnsPerUser?: number;

  /** Turns returned by enhanceContext (default: 5) */
  recentTurns?: number;

  /** Inactivity after which a session is closed (default: 30 minutes) */
  idleTimeoutMs?: number;

  now?: () => number;
  generateId?: () => string;

  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

type ActiveSession = {
  sessionId: Id;
  startedAt: number;
  lastActivityAt: number;
  digest: SessionDigest;
};

type UserMemory = {
  turns: RingBuffer<ConversationTurn>;
  session?: ActiveSession;
};

export class ConversationMemory {
  private readonly summaries: SessionSummaryRepository;
  private readonly maxTurnsPerUser: number;
  private readonly recentTurns: number;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  private readonly users = new Map<Id, UserMemory>();
  private readonly locks = new KeyedMutex();

  /** Closed summaries whose append failed; retried on the next write */
  private readonly unpersisted = new Map<Id, SessionSummary>();

  constructor(options: ConversationMemoryOptions) {
    this.summaries = options.summaries;
    this.maxTurnsPerUser = options.maxTurnsPerUser ?? DEFAULT_MAX_TURNS_PER_USER;
    this.recentTurns = options.recentTurns ?? DEFAULT_RECENT_TURNS_IN_CONTEXT;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_SESSION_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Open a session for `userId`, or return the one already active.
   */
  async startSession(userId: Id, firstQuery?: string): Promise<Id> {
    const { sessionId, closed } = await this.locks.runExclusive(userId, () => {
      const memory = this.userMemory(userId);
      const closed = this.closeIfIdle(userId, memory);
      const session = memory.session ?? this.openSession(userId, memory, firstQuery);
      return { sessionId: session.sessionId, closed };
    });

    await this.persistAll(closed ? [closed] : []);
    return sessionId;
  }

  /**
   * Record a completed exchange, opening a session first if none is active.
   * The stored turn is frozen.
   */
  async addTurn(userId: Id, input: NewTurn): Promise<ConversationTurn> {
    const { turn, closed } = await this.locks.runExclusive(userId, () => {
      const memory = this.userMemory(userId);
      const closed = this.closeIfIdle(userId, memory);
      const session = memory.session ?? this.openSession(userId, memory, input.query);

      const turn = freezeTurn({
        ...input,
        contextSnapshot: {
          resourceIds: [...input.contextSnapshot.resourceIds],
          estimatedTokens: input.contextSnapshot.estimatedTokens,
        },
        userId,
        sessionId: session.sessionId,
        topics: input.topics ? [...input.topics] : extractTopics(input.query),
        timestamp: input.timestamp ?? this.now(),
      });

      session.digest = foldTurn(session.digest, turn);
      session.lastActivityAt = this.now();
      memory.turns.push(turn);

      return { turn, closed };
    });

    await this.persistAll(closed ? [closed] : []);
    return turn;
  }

  /**
   * Close the active session and persist its summary. Returns null when
   * no session is active or the session recorded no turns.
   */
  async endSession(userId: Id): Promise<SessionSummary | null> {
    const summary = await this.locks.runExclusive(userId, () => {
      const memory = this.users.get(userId);
      return memory ? this.closeSession(userId, memory) : null;
    });

    if (summary) {
      await this.persistAll([summary]);
    }
    return summary;
  }

  /**
   * Close every session idle for at least the idle timeout.
   */
  async expireIdleSessions(now = this.now()): Promise<SessionSummary[]> {
    const closed: SessionSummary[] = [];

    for (const userId of Array.from(this.users.keys())) {
      const summary = await this.locks.runExclusive(userId, () => {
        const memory = this.users.get(userId);
        return memory ? this.closeIfIdle(userId, memory, now) : null;
      });
      if (summary) closed.push(summary);
    }

    await this.persistAll(closed);
    if (closed.length > 0) {
      this.logger.info(`Expired ${closed.length} idle session(s)`);
    }
    return closed;
  }

  /**
   * Close every active session regardless of idleness. Used on shutdown.
   */
  async endAllSessions(): Promise<SessionSummary[]> {
    const closed: SessionSummary[] = [];

    for (const userId of Array.from(this.users.keys())) {
      const summary = await this.locks.runExclusive(userId, () => {
        const memory = this.users.get(userId);
        return memory ? this.closeSession(userId, memory) : null;
      });
      if (summary) closed.push(summary);
    }

    await this.persistAll(closed);
    return closed;
  }

  /**
   * Latest turns for a user, oldest first
   */
  getRecentTurns(userId: Id, limit = this.maxTurnsPerUser): ConversationTurn[] {
    return this.users.get(userId)?.turns.last(limit) ?? [];
  }

  getPendingDigest(userId: Id): SessionDigest | null {
    const session = this.users.get(userId)?.session;
    return session ? structuredClone(session.digest) : null;
  }

  getActiveSessionId(userId: Id): Id | undefined {
    return this.users.get(userId)?.session?.sessionId;
  }

  /**
   * Closed sessions for a user, most recently ended first. Includes
   * summaries still waiting to be persisted.
   */
  async listSummaries(userId: Id, options: { limit?: number } = {}): Promise<SessionSummary[]> {
    const stored = await this.summaries.listForUser(userId, options);
    const storedIds = new Set(stored.map((s) => s.sessionId));
    const waiting = Array.from(this.unpersisted.values()).filter(
      (s) => s.userId === userId && !storedIds.has(s.sessionId)
    );
    if (waiting.length === 0) return stored;

    const merged = [...stored, ...waiting].sort((a, b) => b.endedAt - a.endedAt);
    return options.limit === undefined ? merged : merged.slice(0, options.limit);
  }

  /**
   * Retry summaries whose earlier append failed. Returns how many remain.
   */
  async flushPending(): Promise<number> {
    await this.persistAll([]);
    return this.unpersisted.size;
  }

  /**
   * Continuity for a new request. Never modifies memory. If the summary
   * store cannot be read the result is empty and memoryAvailable is false.
   */
  async enhanceContext(userId: Id, query: string): Promise<MemoryEnhancement> {
    let summaries: SessionSummary[];
    try {
      summaries = await this.listSummaries(userId, { limit: SUMMARY_LOOKBACK });
    } catch (error) {
      this.logger.warn('Conversation memory unavailable', { userId, error: errorMessage(error) });
      return emptyEnhancement(userId, false);
    }

    const memory = this.users.get(userId);
    const session =
      memory?.session && !this.isIdle(memory.session, this.now()) ? memory.session : undefined;
    const recent = memory ? memory.turns.last(this.recentTurns) : [];
    const lastTurn = recent.at(-1);

    const roles = summaries.flatMap((s) => s.digest.roles).concat(session?.digest.roles ?? []);

    return {
      userId,
      activeSessionId: session?.sessionId,
      recentTurns: recent.map((turn) => ({
        query: turn.query,
        response: turn.response.slice(0, RECENT_RESPONSE_LIMIT),
        role: turn.role,
        topics: [...turn.topics],
        timestamp: turn.timestamp,
      })),
      relevantSummary: mostRelevantSummary(summaries, extractTopics(query)),
      preferences: {
        expertiseLevel: assessExpertise(roles, summaries.length),
        preferredTopics: preferredTopics(summaries, session?.digest),
      },
      continuity: {
        lastTopic: lastTurn?.topics[0],
        lastRole: lastTurn?.role,
        momentum: session?.digest.turnCount ?? 0,
      },
      memoryAvailable: true,
    };
  }

  private userMemory(userId: Id): UserMemory {
    let memory = this.users.get(userId);
    if (!memory) {
      memory = { turns: new RingBuffer<ConversationTurn>(this.maxTurnsPerUser) };
      this.users.set(userId, memory);
    }
    return memory;
  }

  private openSession(userId: Id, memory: UserMemory, firstQuery?: string): ActiveSession {
    const now = this.now();
    const session: ActiveSession = {
      sessionId: this.generateId(),
      startedAt: now,
      lastActivityAt: now,
      digest: emptyDigest(),
    };
    memory.session = session;

    this.logger.debug('Started conversation session', {
      userId,
      sessionId: session.sessionId,
      firstQuery: firstQuery?.slice(0, 80),
    });
    return session;
  }

  private isIdle(session: ActiveSession, now: number): boolean {
    return now - session.lastActivityAt >= this.idleTimeoutMs;
  }

  private closeIfIdle(userId: Id, memory: UserMemory, now = this.now()): SessionSummary | null {
    if (!memory.session || !this.isIdle(memory.session, now)) return null;
    this.logger.debug('Closing idle session', { userId, sessionId: memory.session.sessionId });
    return this.closeSession(userId, memory);
  }

  private closeSession(userId: Id, memory: UserMemory): SessionSummary | null {
    const session = memory.session;
    if (!session) return null;
    memory.session = undefined;

    if (session.digest.turnCount === 0) return null;

    const digest = structuredClone(session.digest);
    return Object.freeze({
      sessionId: session.sessionId,
      userId,
      startedAt: session.startedAt,
      endedAt: Math.max(session.lastActivityAt, session.startedAt),
      digest,
      topics: [...digest.topics],
    });
  }

  private async persistAll(summaries: SessionSummary[]): Promise<void> {
    const queue = [...this.unpersisted.values(), ...summaries];

    for (const summary of queue) {
      try {
        const { inserted } = await this.summaries.append(summary);
        this.unpersisted.delete(summary.sessionId);
        this.logger.info('Persisted session summary', {
          userId: summary.userId,
          sessionId: summary.sessionId,
          turnCount: summary.digest.turnCount,
          inserted,
        });
      } catch (error) {
        this.unpersisted.set(summary.sessionId, summary);
        this.logger.error('Failed to persist session summary', {
          sessionId: summary.sessionId,
          error: errorMessage(error),
        });
      }
    }
  }
}

function freezeTurn(turn: ConversationTurn): ConversationTurn {
  Object.freeze(turn.topics);
  Object.freeze(turn.contextSnapshot.resourceIds);
  Object.freeze(turn.contextSnapshot);
  return Object.freeze(turn);
}

function emptyEnhancement(userId: Id, memoryAvailable: boolean): MemoryEnhancement {
  return {
    userId,
    recentTurns: [],
    preferences: { expertiseLevel: 'beginner', preferredTopics: [] },
    continuity: { momentum: 0 },
    memoryAvailable,
  };
}

/**
 * Summary sharing the most topics with the query; ties go to the most
 * recent. `summaries` is most recent first.
 */
function mostRelevantSummary(summaries: SessionSummary[], queryTopics: string[]): SessionSummary | undefined {
  let best: SessionSummary | undefined;
  let bestOverlap = 0;

  for (const summary of summaries) {
    const overlap = summary.topics.filter((t) => queryTopics.includes(t)).length;
    if (overlap > bestOverlap) {
      best = summary;
      bestOverlap = overlap;
    }
  }
  return best;
}

function preferredTopics(summaries: SessionSummary[], pending?: SessionDigest): string[] {
  const counts = new Map<string, number>();
  const digests = summaries.map((s) => s.digest);
  if (pending) digests.push(pending);

  for (const digest of digests) {
    for (const [topic, count] of Object.entries(digest.topicCounts)) {
      counts.set(topic, (counts.get(topic) ?? 0) + count);
    }
  }

  return Array.from(counts.entries())
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
    .slice(0, MAX_PREFERRED_TOPICS)
    .map(([topic]) => topic);
}
