import { CATEGORY_PRIORITY, type Category } from "../types/categories";
import {
  NO_MATCH_REASON,
  noActionDecision,
  restrictiveness,
  type CategoryOutcome,
  type Decision,
} from "../types/common";

export type CategoryOutcomes = Partial<Record<Category, CategoryOutcome>>;

export function describeOutcome(outcome: CategoryOutcome): string {
  return `${outcome.category} content detected; sensitivity=${outcome.sensitivity}; severity=${outcome.severity}`;
}

/** Firing outcomes in reporting priority order (sexual, violence, language). */
export function firingOutcomes(outcomes: CategoryOutcomes): CategoryOutcome[] {
  return CATEGORY_PRIORITY.map((c) => outcomes[c]).filter(
    (o): o is CategoryOutcome => o !== undefined && o.fires,
  );
}

/** skip beats fast_forward beats mute; equal actions keep the longer duration. */
export function mostRestrictive(firing: CategoryOutcome[]): CategoryOutcome | undefined {
  let best: CategoryOutcome | undefined;
  for (const o of firing) {
    if (
      !best ||
      restrictiveness(o.action) > restrictiveness(best.action) ||
      (o.action === best.action && o.duration_seconds > best.duration_seconds)
    ) {
      best = o;
    }
  }
  return best;
}

/**
 * Collapse per-category outcomes into one decision.
 * Priority picks the reported category; restrictiveness picks the action, so
 * the two can come from different categories.
 */
export function resolve(outcomes: CategoryOutcomes): Decision {
  const firing = firingOutcomes(outcomes);
  const applied = mostRestrictive(firing);
  if (firing.length === 0 || !applied) return noActionDecision(NO_MATCH_REASON);

  const [reported, ...others] = firing;
  let reason = describeOutcome(reported);
  if (others.length > 0) {
    reason += `; also detected=${others.map((o) => o.category).join(",")}`;
  }

  return {
    action: applied.action,
    duration_seconds: applied.duration_seconds,
    matched_category: reported.category,
    reason,
  };
}
