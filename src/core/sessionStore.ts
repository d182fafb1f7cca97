import { AUTH_STATES } from "../types.js";
import { ChatgateError, CorruptSessionError, SessionStoreError } from "./errors.js";
import { Logger } from "./logger.js";
import { nowIso } from "./utils.js";
import type { Db, SessionRow } from "./db.js";
import type { AuthState, Session } from "../types.js";

/**
 * Per-sender conversation state. `get` never fails on a miss: an unknown
 * sender is an implicit UNVERIFIED session that is only written on `put`.
 */
export interface SessionStore {
  get(senderAddress: string): Promise<Session>;
  put(senderAddress: string, session: Session): Promise<void>;
  clear(senderAddress: string): Promise<void>;
  list(): Promise<Session[]>;
}

export function initialSession(senderAddress: string): Session {
  return {
    senderAddress,
    authState: "UNVERIFIED",
    userId: null,
    lastUpdated: nowIso()
  };
}

function isAuthState(value: string): value is AuthState {
  return (AUTH_STATES as readonly string[]).includes(value);
}

export function sessionFromRow(row: SessionRow): Session {
  const state = row.auth_state;
  if (!isAuthState(state)) {
    throw new CorruptSessionError(row.sender_address, `unknown auth state '${state}'`);
  }
  if (state === "VERIFIED") {
    if (!row.user_id) {
      throw new CorruptSessionError(row.sender_address, "VERIFIED without user id");
    }
    return {
      senderAddress: row.sender_address,
      authState: state,
      userId: row.user_id,
      lastUpdated: row.updated_at
    };
  }
  if (row.user_id !== null) {
    throw new CorruptSessionError(row.sender_address, `${state} carries user id`);
  }
  return {
    senderAddress: row.sender_address,
    authState: state,
    userId: null,
    lastUpdated: row.updated_at
  };
}

export function sessionToRow(session: Session): SessionRow {
  return {
    sender_address: session.senderAddress,
    auth_state: session.authState,
    user_id: session.userId,
    updated_at: session.lastUpdated
  };
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  async get(senderAddress: string): Promise<Session> {
    const existing = this.sessions.get(senderAddress);
    return existing ? { ...existing } : initialSession(senderAddress);
  }

  async put(senderAddress: string, session: Session): Promise<void> {
    this.sessions.set(senderAddress, { ...session, senderAddress });
  }

  async clear(senderAddress: string): Promise<void> {
    this.sessions.delete(senderAddress);
  }

  async list(): Promise<Session[]> {
    return [...this.sessions.values()].map((session) => ({ ...session }));
  }

  get size(): number {
    return this.sessions.size;
  }
}

type SessionSource = Pick<Db, "getSessionRow" | "upsertSessionRow" | "deleteSessionRow" | "listSessionRows">;

export class SqliteSessionStore implements SessionStore {
  private readonly logger = new Logger("sessions");

  constructor(private readonly db: SessionSource) {}

  async get(senderAddress: string): Promise<Session> {
    const row = await this.guard("get", () => this.db.getSessionRow(senderAddress));
    return row ? sessionFromRow(row) : initialSession(senderAddress);
  }

  async put(senderAddress: string, session: Session): Promise<void> {
    await this.guard("put", () => this.db.upsertSessionRow(sessionToRow({ ...session, senderAddress })));
  }

  async clear(senderAddress: string): Promise<void> {
    await this.guard("clear", () => this.db.deleteSessionRow(senderAddress));
  }

  /** Corrupt rows are logged and left out; `get` resets them when their sender writes again. */
  async list(): Promise<Session[]> {
    const rows = await this.guard("list", () => this.db.listSessionRows());
    const sessions: Session[] = [];
    for (const row of rows) {
      try {
        sessions.push(sessionFromRow(row));
      } catch (err) {
        if (!(err instanceof CorruptSessionError)) {
          throw err;
        }
        this.logger.error("corrupt session skipped in listing", {
          senderAddress: row.sender_address,
          authState: row.auth_state,
          userId: row.user_id,
          error: err.message
        });
      }
    }
    return sessions;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ChatgateError) {
        throw err;
      }
      throw new SessionStoreError(operation, err);
    }
  }
}
