import { InvalidArgumentError } from "commander";

import { CATEGORIES, isSensitivity, type Category, type Sensitivity } from "../types/categories";
import type { Action, Decision } from "../types/common";
import type { Preferences } from "../types/schemas";
import type { SignalHit } from "../core/matcher";

export type FilterLevel = Sensitivity | "off";

export type FilterLevels = Record<Category, FilterLevel>;

/** commander option parser for --language/--sexual/--violence. */
export function parseFilterLevel(value: string): FilterLevel {
  const v = value.trim().toLowerCase();
  if (v === "off" || isSensitivity(v)) return v;
  throw new InvalidArgumentError("expected one of: low, medium, high, off");
}

export function preferencesFromLevels(levels: FilterLevels): Preferences {
  const sensitivity = (l: FilterLevel): Sensitivity => (l === "off" ? "medium" : l);
  return {
    language_filter: levels.language !== "off",
    sexual_content_filter: levels.sexual !== "off",
    violence_filter: levels.violence !== "off",
    language_sensitivity: sensitivity(levels.language),
    sexual_content_sensitivity: sensitivity(levels.sexual),
    violence_sensitivity: sensitivity(levels.violence),
  };
}

/** 0 none, 2 mute, 3 fast_forward, 4 skip (1 is reserved for errors). */
export function exitCodeFor(action: Action): number {
  switch (action) {
    case "none": return 0;
    case "mute": return 2;
    case "fast_forward": return 3;
    case "skip": return 4;
  }
}

export function formatDecision(decision: Decision, hits?: Record<Category, SignalHit[]>): string {
  const lines = [
    `action: ${decision.action.toUpperCase()}`,
    `duration: ${decision.duration_seconds}s`,
    `category: ${decision.matched_category ?? "-"}`,
    `reason: ${decision.reason}`,
  ];
  if (hits) {
    const found = CATEGORIES.flatMap((c) => hits[c].map((h) => `${h.signal} (${c}/${h.group})`));
    if (found.length) lines.push(`signals: ${found.join(", ")}`);
  }
  return lines.join("\n");
}
