import {
  CATEGORIES,
  SENSITIVITIES,
  isCategory,
  isSensitivity,
  type Category,
  type Sensitivity,
} from "../types/categories";
import { restrictiveness, type CategoryOutcome } from "../types/common";
import type { RampStep, Thresholds } from "../types/schemas";
import { InvalidConfigurationError } from "./errors";

/** Per (category, sensitivity): ordered severity steps, see RampSchema. */
export type SensitivityRamps = Record<Category, Record<Sensitivity, RampStep[]>>;

export interface EvaluationPolicy {
  /** Minimum severity at which a category fires, per sensitivity. */
  thresholds: Thresholds;
  ramps: SensitivityRamps;
}

/** Last step whose min_severity has been reached. */
export function stepFor(ramp: RampStep[], severity: number): RampStep {
  let chosen = ramp[0];
  for (const step of ramp) {
    if (step.min_severity <= severity) chosen = step;
  }
  return chosen;
}

/**
 * Decide whether one category fires for the given severity, and what it asks
 * the player to do. Disabled categories never fire. Category and sensitivity
 * arrive unchecked from stored records and are validated here.
 */
export function evaluate(
  category: string,
  severity: number,
  enabled: boolean,
  sensitivity: string,
  policy: EvaluationPolicy,
): CategoryOutcome {
  if (!isCategory(category)) {
    throw new InvalidConfigurationError(`unknown category: ${JSON.stringify(category)}`);
  }
  if (!isSensitivity(sensitivity)) {
    throw new InvalidConfigurationError(
      `unknown sensitivity for ${category}: ${JSON.stringify(sensitivity)}`,
    );
  }
  if (!Number.isInteger(severity) || severity < 0) {
    throw new RangeError(`severity must be a non-negative integer, got ${severity}`);
  }

  if (!enabled || severity < policy.thresholds[sensitivity]) {
    return { category, fires: false, action: "none", duration_seconds: 0, severity, sensitivity };
  }

  const step = stepFor(policy.ramps[category][sensitivity], severity);
  return {
    category,
    fires: true,
    action: step.action,
    duration_seconds: step.duration_seconds,
    severity,
    sensitivity,
  };
}

/**
 * Raising the sensitivity of a category must never make its action strictly
 * weaker. Checked for every severity where a step or threshold changes, plus one.
 */
export function checkRampConsistency(policy: EvaluationPolicy): void {
  for (const c of CATEGORIES) {
    const ramps = policy.ramps[c];
    const horizon =
      Math.max(
        ...SENSITIVITIES.flatMap((s) => ramps[s].map((step) => step.min_severity)),
        ...SENSITIVITIES.map((s) => policy.thresholds[s]),
      ) + 1;

    for (let severity = 1; severity <= horizon; severity++) {
      for (let i = 1; i < SENSITIVITIES.length; i++) {
        const lower = SENSITIVITIES[i - 1];
        const higher = SENSITIVITIES[i];
        if (severity < policy.thresholds[lower]) continue;

        const weak = stepFor(ramps[lower], severity).action;
        const strong = stepFor(ramps[higher], severity).action;
        if (restrictiveness(strong) < restrictiveness(weak)) {
          throw new InvalidConfigurationError(
            `actions.${c}: ${higher} yields ${strong} at severity ${severity}, ` +
              `less restrictive than ${lower} (${weak})`,
          );
        }
      }
    }
  }
}
