import type { Session, SessionStatus } from "@concord/types";

/**
 * Session store, owned by a single Session Sequencer.
 */
export interface SessionStore {
  get(id: string): Session | undefined;
  put(session: Session): void;
  list(status?: SessionStatus): Session[];
}

export class InMemorySessionStore implements SessionStore {
  private readonly _sessions = new Map<string, Session>();

  get(id: string): Session | undefined {
    return this._sessions.get(id);
  }

  put(session: Session): void {
    this._sessions.set(session.id, session);
  }

  list(status?: SessionStatus): Session[] {
    const all = [...this._sessions.values()];
    return status === undefined ? all : all.filter((s) => s.status === status);
  }
}
