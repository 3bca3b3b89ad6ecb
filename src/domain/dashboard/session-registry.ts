import type { FilterSet } from "../filters/types.js";

export const DEFAULT_SESSION_ID = "default";
const SESSION_ID = /^[\w.-]{1,64}$/;
const MAX_SESSIONS = 1000;

export interface SessionState {
  id: string;
  filters: FilterSet;
  updatedAt: string;
}

/**
 * Filter state per dashboard session. Sessions never see each other's
 * filters; the oldest idle session is dropped past MAX_SESSIONS.
 */
export class SessionRegistry {
  private sessions = new Map<string, SessionState>();

  static normalizeId(sessionId: string | undefined): string {
    const id = sessionId?.trim() || DEFAULT_SESSION_ID;
    if (!SESSION_ID.test(id)) {
      throw new Error(
        `Invalid session id "${id}": use up to 64 letters, digits, ".", "_" or "-"`,
      );
    }
    return id;
  }

  get(sessionId?: string): SessionState {
    const id = SessionRegistry.normalizeId(sessionId);
    return this.sessions.get(id) ?? { id, filters: {}, updatedAt: "" };
  }

  setFilters(sessionId: string | undefined, filters: FilterSet): SessionState {
    const id = SessionRegistry.normalizeId(sessionId);
    const state: SessionState = {
      id,
      filters,
      updatedAt: new Date().toISOString(),
    };
    this.sessions.delete(id);
    this.sessions.set(id, state);
    while (this.sessions.size > MAX_SESSIONS) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    return state;
  }

  clear(sessionId?: string): SessionState {
    return this.setFilters(sessionId, {});
  }

  list(): SessionState[] {
    return [...this.sessions.values()];
  }
}
