import {
  DEFAULT_PREFERENCES,
  PreferencesSchema,
  type Preferences,
  type PreferencesUpdate,
} from "../types/schemas";
import { UsernameTakenError } from "../core/errors";

export interface User {
  id: number;
  username: string;
  created_at: string; // ISO-8601
}

/**
 * Users and their filtering preferences. Preferences are created with
 * DEFAULT_PREFERENCES alongside the user and removed only with it.
 */
export interface PreferencesStore {
  /** Throws UsernameTakenError when the name is in use. */
  createUser(username: string): Promise<User>;
  getUser(userId: number): Promise<User | null>;
  getPreferences(userId: number): Promise<Preferences | null>;
  /** Partial update; returns null for an unknown user. */
  updatePreferences(userId: number, patch: PreferencesUpdate): Promise<Preferences | null>;
  close(): void;
}

/** All the decision engine needs from a store. */
export type PreferencesLookup = Pick<PreferencesStore, "getPreferences">;

export const PREFERENCE_FIELDS = PreferencesSchema.keyof().options;

/** Copy only the fields actually present in a patch. */
export function applyPatch(current: Preferences, patch: PreferencesUpdate): Preferences {
  const next = { ...current };
  for (const field of PREFERENCE_FIELDS) {
    const value = patch[field];
    if (value !== undefined) Object.assign(next, { [field]: value });
  }
  return next;
}

/** Process-local store for tests and the CLI. */
export class InMemoryPreferencesStore implements PreferencesStore {
  private readonly users = new Map<number, User>();
  private readonly preferences = new Map<number, Preferences>();
  private nextId = 1;

  async createUser(username: string): Promise<User> {
    for (const u of this.users.values()) {
      if (u.username === username) throw new UsernameTakenError(username);
    }
    const user: User = { id: this.nextId++, username, created_at: new Date().toISOString() };
    this.users.set(user.id, user);
    this.preferences.set(user.id, { ...DEFAULT_PREFERENCES });
    return { ...user };
  }

  async getUser(userId: number): Promise<User | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async getPreferences(userId: number): Promise<Preferences | null> {
    const prefs = this.preferences.get(userId);
    return prefs ? { ...prefs } : null;
  }

  async updatePreferences(userId: number, patch: PreferencesUpdate): Promise<Preferences | null> {
    const current = this.preferences.get(userId);
    if (!current) return null;
    const next = applyPatch(current, patch);
    this.preferences.set(userId, next);
    return { ...next };
  }

  close(): void {
    this.users.clear();
    this.preferences.clear();
  }
}
