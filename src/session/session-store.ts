import Redis from 'ioredis';
import { Session } from '../config/types';
import { PipelineConfig } from '../config/pipeline-config';
import { CommitResult, SessionStore } from './types';
import { parseSession } from './session-model';
import { logger } from '../observability/logger';
import { sessionStoreErrors } from '../observability/metrics';
import { retryWithBackoff, withTimeout } from '../resilience/retry';

type Clock = () => number;

/**
 * Compare-and-set on a hash holding `version` and `data`.
 * Returns 1 when written, 0 on a version mismatch.
 */
const COMMIT_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'version')
local expected = tonumber(ARGV[1])
if current == false then
  if expected ~= 0 then return 0 end
elseif tonumber(current) ~= expected then
  return 0
end
redis.call('HSET', KEYS[1], 'version', ARGV[2], 'data', ARGV[3])
redis.call('PEXPIRE', KEYS[1], ARGV[4])
return 1
`;

function stamp(session: Session, expectedVersion: number, ttlMs: number, now: number): Session {
  return {
    ...session,
    version: expectedVersion + 1,
    updatedAt: now,
    expiresAt: now + ttlMs,
  };
}

/**
 * Redis-backed session store.
 * One hash per session; expiry handled by Redis through PEXPIRE.
 */
export class RedisSessionStore implements SessionStore {
  private log = logger.child({ component: 'redis-session-store' });

  constructor(
    private readonly redis: Redis,
    private readonly ttlMs: number,
    private readonly prefix: string = '',
    private readonly clock: Clock = Date.now,
  ) {}

  private key(sessionId: string): string {
    return `${this.prefix}session:${sessionId}`;
  }

  async load(sessionId: string): Promise<Session | null> {
    const raw = await this.redis.hget(this.key(sessionId), 'data');
    if (!raw) return null;
    const session = parseSession(raw);
    if (!session) {
      this.log.error({ sessionId }, 'Stored session failed shape check; treating as absent');
    }
    return session;
  }

  async commit(sessionId: string, expectedVersion: number, session: Session): Promise<CommitResult> {
    const next = stamp(session, expectedVersion, this.ttlMs, this.clock());
    const written = await this.redis.eval(
      COMMIT_SCRIPT,
      1,
      this.key(sessionId),
      String(expectedVersion),
      String(next.version),
      JSON.stringify(next),
      String(this.ttlMs),
    );

    if (written === 1) {
      return { ok: true, session: next };
    }

    const current = await this.redis.hget(this.key(sessionId), 'version');
    return { ok: false, conflict: true, currentVersion: current === null ? null : Number(current) };
  }
}

/**
 * In-memory session store (dev/test fallback).
 * Expired records are dropped lazily when read or overwritten.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now,
  ) {}

  private live(sessionId: string): Session | undefined {
    const stored = this.sessions.get(sessionId);
    if (stored && stored.expiresAt <= this.clock()) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return stored;
  }

  async load(sessionId: string): Promise<Session | null> {
    const stored = this.live(sessionId);
    return stored ? structuredClone(stored) : null;
  }

  async commit(sessionId: string, expectedVersion: number, session: Session): Promise<CommitResult> {
    const stored = this.live(sessionId);
    const currentVersion = stored ? stored.version : 0;

    if (currentVersion !== expectedVersion) {
      return { ok: false, conflict: true, currentVersion: stored ? stored.version : null };
    }

    const next = stamp(session, expectedVersion, this.ttlMs, this.clock());
    this.sessions.set(sessionId, structuredClone(next));
    return { ok: true, session: next };
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Adds a per-call timeout and transient-error retry to any store.
 * A conflict is a normal return value and is passed through untouched.
 */
export class ResilientSessionStore implements SessionStore {
  private log = logger.child({ component: 'session-store' });

  constructor(
    private readonly inner: SessionStore,
    private readonly policy: PipelineConfig['session'],
  ) {}

  load(sessionId: string): Promise<Session | null> {
    return this.run('load', sessionId, () => this.inner.load(sessionId));
  }

  commit(sessionId: string, expectedVersion: number, session: Session): Promise<CommitResult> {
    return this.run('commit', sessionId, () => this.inner.commit(sessionId, expectedVersion, session));
  }

  private async run<T>(operation: 'load' | 'commit', sessionId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(
        () => withTimeout(fn(), this.policy.operationTimeoutMs, `session.${operation}`),
        this.policy.retry,
        {
          onRetry: (err, attempt, delayMs) => {
            this.log.warn({ err, sessionId, operation, attempt, delayMs }, 'Session store call failed, retrying');
          },
        },
      );
    } catch (err) {
      sessionStoreErrors.inc({ operation });
      throw err;
    }
  }
}

/**
 * Factory: create the appropriate session store based on environment.
 */
export function createSessionStore(
  config: PipelineConfig,
  redis?: Redis,
  keyPrefix?: string,
): SessionStore {
  if (redis) {
    return new ResilientSessionStore(new RedisSessionStore(redis, config.session.ttlMs, keyPrefix), config.session);
  }
  logger.warn('Using in-memory session store (no Redis)');
  return new ResilientSessionStore(new InMemorySessionStore(config.session.ttlMs), config.session);
}
