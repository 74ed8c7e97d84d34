import { PersistenceError } from '../errors';
import type { Session } from '../types';
import { createLogger } from '../util/logger';

const logger = createLogger('MemoryBank');

function snapshot(session: Session): Session {
  try {
    return structuredClone(session);
  } catch (error) {
    throw new PersistenceError(`Session ${session.sessionId} could not be copied for storage`, { cause: error });
  }
}

/**
 * Process-local session store. Entries are deep copies: later changes to a live
 * session are invisible here until it is saved again, and callers of `get` get
 * their own copy.
 */
export class MemoryBank {
  private sessions: Map<string, Session> = new Map();

  save(session: Session): void {
    const existed = this.sessions.has(session.sessionId);
    this.sessions.set(session.sessionId, snapshot(session));
    logger.debug(`${existed ? 'Updated' : 'Saved'} session ${session.sessionId}`);
  }

  get(sessionId: string): Session | undefined {
    const stored = this.sessions.get(sessionId);
    return stored ? structuredClone(stored) : undefined;
  }

  history(userId: string): Session[] {
    return Array.from(this.sessions.values())
      .filter(s => s.userProfile.userId === userId)
      .map(s => structuredClone(s));
  }

  get size(): number {
    return this.sessions.size;
  }
}
