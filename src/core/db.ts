import sqlite3 from "sqlite3";
import { promisify } from "node:util";
import { randomUUID } from "node:crypto";
import type { NewUser, UserRecord } from "../types.js";

interface RunResult {
  lastID: number;
  changes: number;
}

interface UserRow {
  id: string;
  phone: string;
  client_code: string;
  company_id: string;
  name: string;
  email: string;
  is_active: number;
  created_at: string;
}

export interface SessionRow {
  sender_address: string;
  auth_state: string;
  user_id: string | null;
  updated_at: string;
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    phone: row.phone,
    clientCode: row.client_code,
    companyId: row.company_id,
    name: row.name,
    email: row.email,
    isActive: row.is_active === 1,
    createdAt: row.created_at
  };
}

export class Db {
  private readonly db: sqlite3.Database;

  constructor(dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async close(): Promise<void> {
    await promisify(this.db.close.bind(this.db))();
  }

  private run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function onRun(err) {
        if (err) {
          reject(err);
          return;
        }
        resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  private get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err, row) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(row as T | undefined);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows as T[]);
      });
    });
  }

  async migrate(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        phone TEXT NOT NULL,
        client_code TEXT NOT NULL UNIQUE,
        company_id TEXT NOT NULL,
        name TEXT NOT NULL,
        email TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL
      )
    `);
    await this.run(`CREATE INDEX IF NOT EXISTS ix_users_phone ON users (phone)`);
    await this.run(`CREATE INDEX IF NOT EXISTS ix_users_company_id ON users (company_id)`);
    await this.run(`
      CREATE TABLE IF NOT EXISTS sessions (
        sender_address TEXT PRIMARY KEY,
        auth_state TEXT NOT NULL,
        user_id TEXT,
        updated_at TEXT NOT NULL
      )
    `);
  }

  async addUser(user: NewUser): Promise<UserRecord> {
    const now = new Date().toISOString();
    const id = randomUUID();
    await this.run(
      `INSERT INTO users (id, phone, client_code, company_id, name, email, is_active, created_at)
       VALUES (?, ?, ?, ?, ?, ?, 1, ?)`,
      [id, user.phone, user.clientCode, user.companyId, user.name, user.email, now]
    );
    return {
      id,
      ...user,
      isActive: true,
      createdAt: now
    };
  }

  async findActiveUsersByPhone(phone: string): Promise<UserRecord[]> {
    const rows = await this.all<UserRow>(`SELECT * FROM users WHERE phone = ? AND is_active = 1`, [phone]);
    return rows.map(toUser);
  }

  async findActiveUsersByClientCode(clientCode: string): Promise<UserRecord[]> {
    // = on TEXT uses the BINARY collation, so matching is case-sensitive.
    const rows = await this.all<UserRow>(`SELECT * FROM users WHERE client_code = ? AND is_active = 1`, [clientCode]);
    return rows.map(toUser);
  }

  async getUserById(id: string): Promise<UserRecord | null> {
    const row = await this.get<UserRow>(`SELECT * FROM users WHERE id = ?`, [id]);
    return row ? toUser(row) : null;
  }

  async listUsers(): Promise<UserRecord[]> {
    const rows = await this.all<UserRow>(`SELECT * FROM users ORDER BY created_at ASC`);
    return rows.map(toUser);
  }

  async setUserActive(userId: string, isActive: boolean): Promise<void> {
    await this.run(`UPDATE users SET is_active = ? WHERE id = ?`, [isActive ? 1 : 0, userId]);
  }

  async getSessionRow(senderAddress: string): Promise<SessionRow | undefined> {
    return await this.get<SessionRow>(`SELECT * FROM sessions WHERE sender_address = ?`, [senderAddress]);
  }

  async upsertSessionRow(row: SessionRow): Promise<void> {
    await this.run(
      `INSERT INTO sessions (sender_address, auth_state, user_id, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(sender_address) DO UPDATE SET auth_state=excluded.auth_state, user_id=excluded.user_id, updated_at=excluded.updated_at`,
      [row.sender_address, row.auth_state, row.user_id, row.updated_at]
    );
  }

  async deleteSessionRow(senderAddress: string): Promise<void> {
    await this.run(`DELETE FROM sessions WHERE sender_address = ?`, [senderAddress]);
  }

  async listSessionRows(): Promise<SessionRow[]> {
    return await this.all<SessionRow>(`SELECT * FROM sessions ORDER BY updated_at DESC`);
  }
}
