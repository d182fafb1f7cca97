import { Logger } from "./logger.js";
import { ChatgateError, DirectoryConflictError, TransientFailureError } from "./errors.js";
import { withTimeout } from "./utils.js";
import type { Db } from "./db.js";
import type { UserRecord } from "../types.js";

/** Read-only view of the customer directory. A miss resolves to null; only I/O problems reject. */
export interface DirectoryLookup {
  findByPhone(address: string): Promise<UserRecord | null>;
  findByClientCode(code: string): Promise<UserRecord | null>;
  findById(userId: string): Promise<UserRecord | null>;
}

export type DirectorySource = Pick<Db, "findActiveUsersByPhone" | "findActiveUsersByClientCode" | "getUserById">;

export class SqliteDirectory implements DirectoryLookup {
  private readonly logger = new Logger("directory");

  constructor(
    private readonly source: DirectorySource,
    private readonly lookupTimeoutMs: number
  ) {}

  async findByPhone(address: string): Promise<UserRecord | null> {
    const matches = await this.query("phone lookup", () => this.source.findActiveUsersByPhone(address));
    return this.single("phone", matches);
  }

  async findByClientCode(code: string): Promise<UserRecord | null> {
    const matches = await this.query("client code lookup", () => this.source.findActiveUsersByClientCode(code));
    return this.single("client_code", matches);
  }

  async findById(userId: string): Promise<UserRecord | null> {
    const user = await this.query("user id lookup", () => this.source.getUserById(userId));
    return user && user.isActive ? user : null;
  }

  private async query<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.lookupTimeoutMs, label);
    } catch (err) {
      if (err instanceof ChatgateError) {
        throw err;
      }
      throw new TransientFailureError(`${label} failed: ${String(err)}`, { cause: err });
    }
  }

  private single(field: "phone" | "client_code", matches: UserRecord[]): UserRecord | null {
    if (matches.length > 1) {
      this.logger.error("ambiguous directory match", {
        field,
        userIds: matches.map((user) => user.id)
      });
      throw new DirectoryConflictError(field, matches.length);
    }
    return matches[0] ?? null;
  }
}
