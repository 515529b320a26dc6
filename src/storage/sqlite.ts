import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { isReservedUsername } from "../auth/operation.js";
import { UserNotFoundError } from "../errors.js";
import { logger } from "../logger.js";
import type { User, UserStore } from "./types.js";

const UserRowSchema = z.object({
  username: z.string(),
  external_id: z.string(),
  full_name: z.string().nullable(),
  email: z.string().nullable(),
  group_list: z.string(),
});

type UserRow = z.infer<typeof UserRowSchema>;

const GroupsSchema = z.array(z.string());

function rowToUser(row: UserRow): User {
  return {
    username: row.username,
    externalId: row.external_id,
    fullName: row.full_name ?? undefined,
    email: row.email ?? undefined,
    groups: GroupsSchema.parse(JSON.parse(row.group_list)),
  };
}

export class SqliteUserStore implements UserStore {
  private db: Database.Database;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  static create(dbPath: string): SqliteUserStore {
    // Ensure directory exists
    mkdirSync(dirname(dbPath), { recursive: true });

    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    const store = new SqliteUserStore(db);
    store.initSchema();

    logger.info({ path: dbPath }, "SQLite store initialized");
    return store;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        username TEXT PRIMARY KEY,
        external_id TEXT NOT NULL UNIQUE,
        full_name TEXT,
        email TEXT,
        group_list TEXT NOT NULL DEFAULT '[]'
      )
    `);
  }

  private selectOne(sql: string, param: string): User | null {
    const row = this.db.prepare(sql).get(param);
    if (row === undefined) return null;
    return rowToUser(UserRowSchema.parse(row));
  }

  async findUserByExternalId(externalId: string): Promise<User> {
    const user = this.selectOne(
      "SELECT * FROM users WHERE external_id = ?",
      externalId,
    );
    if (!user) {
      throw new UserNotFoundError(
        `user with external id "${externalId}" not found`,
      );
    }
    return user;
  }

  async getUser(username: string): Promise<User | null> {
    return this.selectOne("SELECT * FROM users WHERE username = ?", username);
  }

  async saveUser(user: User): Promise<void> {
    if (isReservedUsername(user.username)) {
      throw new Error(`username "${user.username}" is reserved`);
    }
    const save = this.db.transaction((u: User) => {
      const owner = this.db
        .prepare("SELECT username FROM users WHERE external_id = ?")
        .pluck()
        .get(u.externalId);
      if (typeof owner === "string" && owner !== u.username) {
        throw new Error(
          `external id "${u.externalId}" already belongs to user "${owner}"`,
        );
      }
      this.db
        .prepare(
          `INSERT INTO users (username, external_id, full_name, email, group_list)
           VALUES (@username, @externalId, @fullName, @email, @groups)
           ON CONFLICT(username) DO UPDATE SET
             external_id = excluded.external_id,
             full_name = excluded.full_name,
             email = excluded.email,
             group_list = excluded.group_list`,
        )
        .run({
          username: u.username,
          externalId: u.externalId,
          fullName: u.fullName ?? null,
          email: u.email ?? null,
          groups: JSON.stringify(u.groups),
        });
    });
    save(user);
  }

  close(): void {
    this.db.close();
  }
}
