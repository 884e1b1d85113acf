import { Session } from '../config/types';

export type CommitResult =
  | { ok: true; session: Session }
  | { ok: false; conflict: true; currentVersion: number | null };

/**
 * Versioned session persistence with optimistic concurrency.
 *
 * `commit` succeeds only when the stored version equals `expectedVersion`
 * (0 meaning "no record yet"). The store assigns the new version, `updatedAt`
 * and `expiresAt`; callers never set them.
 */
export interface SessionStore {
  load(sessionId: string): Promise<Session | null>;
  commit(sessionId: string, expectedVersion: number, session: Session): Promise<CommitResult>;
}
