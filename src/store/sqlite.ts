import Database from "better-sqlite3";
import { z } from "zod";

import { InvalidConfigurationError, UsernameTakenError } from "../core/errors";
import { SensitivityEnum, type Preferences, type PreferencesUpdate } from "../types/schemas";
import { PREFERENCE_FIELDS, type PreferencesStore, type User } from "./preferences";

const UserRowSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  created_at: z.string(),
});

// SQLite has no boolean type: 0/1 on disk.
const flag = z.number().int().transform((v) => v !== 0);

const PreferencesRowSchema = z.object({
  language_filter: flag,
  sexual_content_filter: flag,
  violence_filter: flag,
  language_sensitivity: SensitivityEnum,
  sexual_content_sensitivity: SensitivityEnum,
  violence_sensitivity: SensitivityEnum,
});

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS user_preferences (
    user_id INTEGER PRIMARY KEY REFERENCES users (id) ON DELETE CASCADE,
    language_filter INTEGER NOT NULL DEFAULT 1,
    sexual_content_filter INTEGER NOT NULL DEFAULT 1,
    violence_filter INTEGER NOT NULL DEFAULT 1,
    language_sensitivity TEXT NOT NULL DEFAULT 'medium',
    sexual_content_sensitivity TEXT NOT NULL DEFAULT 'medium',
    violence_sensitivity TEXT NOT NULL DEFAULT 'medium'
  );
`;

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/**
 * better-sqlite3 backed store. Calls are synchronous under the hood, so writes
 * are serialised by the connection; `:memory:` gives a throwaway database.
 */
export class SqlitePreferencesStore implements PreferencesStore {
  private readonly db: Database.Database;

  constructor(file: string) {
    this.db = new Database(file);
    if (file !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  async createUser(username: string): Promise<User> {
    const insert = this.db.transaction((name: string) => {
      const created = new Date().toISOString();
      const info = this.db
        .prepare("INSERT INTO users (username, created_at) VALUES (?, ?)")
        .run(name, created);
      const id = Number(info.lastInsertRowid);
      this.db.prepare("INSERT INTO user_preferences (user_id) VALUES (?)").run(id);
      return { id, username: name, created_at: created };
    });

    try {
      return insert(username);
    } catch (err) {
      if (isUniqueViolation(err)) throw new UsernameTakenError(username);
      throw err;
    }
  }

  async getUser(userId: number): Promise<User | null> {
    const row = this.db.prepare("SELECT id, username, created_at FROM users WHERE id = ?").get(userId);
    return row === undefined ? null : UserRowSchema.parse(row);
  }

  async getPreferences(userId: number): Promise<Preferences | null> {
    return this.readPreferences(userId);
  }

  async updatePreferences(userId: number, patch: PreferencesUpdate): Promise<Preferences | null> {
    const sets: string[] = [];
    const values: Array<string | number> = [];
    for (const field of PREFERENCE_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      // field names come from the schema, never from the request
      sets.push(`${field} = ?`);
      values.push(typeof value === "boolean" ? Number(value) : value);
    }

    if (sets.length > 0) {
      const info = this.db
        .prepare(`UPDATE user_preferences SET ${sets.join(", ")} WHERE user_id = ?`)
        .run(...values, userId);
      if (info.changes === 0) return null;
    }
    return this.readPreferences(userId);
  }

  close(): void {
    this.db.close();
  }

  private readPreferences(userId: number): Preferences | null {
    const row = this.db
      .prepare(
        `SELECT language_filter, sexual_content_filter, violence_filter,
                language_sensitivity, sexual_content_sensitivity, violence_sensitivity
           FROM user_preferences WHERE user_id = ?`,
      )
      .get(userId);
    if (row === undefined) return null;

    const parsed = PreferencesRowSchema.safeParse(row);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
      throw new InvalidConfigurationError(`stored preferences for user ${userId} are invalid (${fields})`);
    }
    return parsed.data;
  }
}
