import type { Category, Sensitivity } from "./categories";

/** Ordered from least to most restrictive. */
export const ACTIONS = ["none", "mute", "fast_forward", "skip"] as const;

export type Action = (typeof ACTIONS)[number];

/** Ramp actions: a firing category always asks the player to do something. */
export type PlaybackAction = Exclude<Action, "none">;

export function restrictiveness(action: Action): number {
  return ACTIONS.indexOf(action);
}

/**
 * Result of evaluating one category for one text. Lives only inside a decision call.
 */
export interface CategoryOutcome {
  category: Category;
  fires: boolean;
  action: Action;
  duration_seconds: number;
  severity: number;
  sensitivity: Sensitivity;
}

/**
 * Final, client-facing decision (what /event returns).
 */
export interface Decision {
  action: Action;
  duration_seconds: number;
  matched_category: Category | null;
  reason: string;
}

/** Simple-mode answer (what /api/analyze builds on). */
export interface AnalyzeResult {
  action: Action;
}

export const NO_MATCH_REASON = "No match";
export const INVALID_REQUEST_REASON = "Invalid request";
export const UNKNOWN_USER_REASON = "Unknown user_id";
export const INVALID_CONFIGURATION_REASON = "Invalid configuration";

export function noActionDecision(reason: string): Decision {
  return { action: "none", duration_seconds: 0, matched_category: null, reason };
}
