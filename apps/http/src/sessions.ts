// apps/http/src/sessions.ts
import { randomUUID } from 'node:crypto';
import { SessionContext, type SessionInit } from '@frostbridge/session';

export class SessionNotFoundError extends Error {
  readonly code = 'SESSION_NOT_FOUND';
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} does not exist`);
    this.name = 'SessionNotFoundError';
  }
}

/** Sessions held by the diagnostic service, keyed by a generated id. */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionContext>();

  create(init: SessionInit = {}): { id: string; session: SessionContext } {
    const id = randomUUID();
    const session = new SessionContext(init);
    this.sessions.set(id, session);
    return { id, session };
  }

  get(id: string): SessionContext {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  delete(id: string): void {
    if (!this.sessions.delete(id)) throw new SessionNotFoundError(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
