import { CATEGORIES, CATEGORY_PREFERENCE_FIELDS } from "../types/categories";
import {
  INVALID_CONFIGURATION_REASON,
  INVALID_REQUEST_REASON,
  UNKNOWN_USER_REASON,
  noActionDecision,
  type AnalyzeResult,
  type Decision,
} from "../types/common";
import {
  EventBodySchema,
  PreferencesSchema,
  type Preferences,
  type UserIdInput,
} from "../types/schemas";
import type { PreferencesLookup } from "../store/preferences";
import { textFingerprint } from "../util/hash";
import { createLogger, type Logger } from "../util/log";
import { withTimeout } from "../util/timeout";
import { resolve, type CategoryOutcomes } from "./decision";
import { InvalidConfigurationError } from "./errors";
import { defaultRules, type CompiledRules } from "./rules";
import { evaluate } from "./thresholds";

export const DEFAULT_LOOKUP_TIMEOUT_MS = 1500;
export const EVALUATION_FAILED_REASON = "Evaluation failed";

export interface EngineOptions {
  rules?: CompiledRules;
  /** Upper bound for the preferences lookup; on expiry the user counts as unknown. */
  lookupTimeoutMs?: number;
  logger?: Logger;
}

type Lookup =
  | { kind: "found"; userId: number; preferences: Preferences }
  | { kind: "unknown_user" }
  | { kind: "invalid_configuration" };

/** Positive integer ids only; "42" and 42 are the same user, "nope" is nobody. */
export function parseUserId(input: UserIdInput): number | null {
  if (typeof input === "number") {
    return Number.isSafeInteger(input) && input > 0 ? input : null;
  }
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * Pure core: text + preferences → matcher → evaluator → resolver.
 * Throws InvalidConfigurationError when preferences or rules disagree.
 */
export function evaluateText(
  preferences: Preferences,
  text: string,
  rules: CompiledRules = defaultRules(),
): Decision {
  const severities = rules.matcher.match(text);
  const outcomes: CategoryOutcomes = {};
  for (const c of CATEGORIES) {
    const fields = CATEGORY_PREFERENCE_FIELDS[c];
    outcomes[c] = evaluate(
      c,
      severities[c],
      preferences[fields.enabled],
      preferences[fields.sensitivity],
      rules,
    );
  }
  return resolve(outcomes);
}

/**
 * Façade used by the HTTP layer. Never throws: every failure collapses to
 * `action: "none"` with the cause in `reason`.
 */
export class DecisionEngine {
  private readonly store: PreferencesLookup;
  private readonly rules: CompiledRules;
  private readonly lookupTimeoutMs: number;
  private readonly log: Logger;

  constructor(store: PreferencesLookup, opts: EngineOptions = {}) {
    this.store = store;
    this.rules = opts.rules ?? defaultRules();
    this.lookupTimeoutMs = opts.lookupTimeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS;
    this.log = opts.logger ?? createLogger("engine");
  }

  evaluate(preferences: Preferences, text: string): Decision {
    return evaluateText(preferences, text, this.rules);
  }

  /** Simple mode: just the action. */
  async analyze(userId: UserIdInput, text: string): Promise<AnalyzeResult> {
    const { action } = await this.decide(userId, text);
    return { action };
  }

  /**
   * Structured mode. `confidence` is accepted and logged but does not
   * influence matching.
   */
  async decide(userId: UserIdInput, text: string, confidence?: number): Promise<Decision> {
    const lookup = await this.lookup(userId);
    if (lookup.kind === "unknown_user") return noActionDecision(UNKNOWN_USER_REASON);
    if (lookup.kind === "invalid_configuration") return noActionDecision(INVALID_CONFIGURATION_REASON);

    try {
      const decision = this.evaluate(lookup.preferences, text);
      this.log.debug("decision", {
        user_id: lookup.userId,
        text: textFingerprint(text),
        confidence,
        action: decision.action,
        matched_category: decision.matched_category,
      });
      return decision;
    } catch (err) {
      this.log.error("evaluation failed", { user_id: lookup.userId, error: (err as Error).message });
      return noActionDecision(
        err instanceof InvalidConfigurationError ? INVALID_CONFIGURATION_REASON : EVALUATION_FAILED_REASON,
      );
    }
  }

  /** Validate an untrusted /event body, then decide. */
  async handleEvent(body: unknown): Promise<Decision> {
    const parsed = EventBodySchema.safeParse(body);
    if (!parsed.success) {
      this.log.debug("invalid event payload", {
        fields: parsed.error.issues.map((i) => i.path.join(".")).join(","),
      });
      return noActionDecision(INVALID_REQUEST_REASON);
    }
    const { user_id, text, confidence } = parsed.data;
    return this.decide(user_id, text, confidence);
  }

  private async lookup(userId: UserIdInput): Promise<Lookup> {
    const id = parseUserId(userId);
    if (id === null) return { kind: "unknown_user" };

    try {
      const stored = await withTimeout(this.store.getPreferences(id), this.lookupTimeoutMs);
      if (!stored) return { kind: "unknown_user" };

      const checked = PreferencesSchema.safeParse(stored);
      if (!checked.success) {
        this.log.error("stored preferences rejected", { user_id: id });
        return { kind: "invalid_configuration" };
      }
      return { kind: "found", userId: id, preferences: checked.data };
    } catch (err) {
      if (err instanceof InvalidConfigurationError) {
        this.log.error("invalid preferences", { user_id: id, error: err.message });
        return { kind: "invalid_configuration" };
      }
      this.log.warn("preferences lookup failed, treating user as unknown", {
        user_id: id,
        error: (err as Error).message,
      });
      return { kind: "unknown_user" };
    }
  }
}
