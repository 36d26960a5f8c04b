import { describe, it, expect } from "vitest";
import { resolve, mostRestrictive } from "../src/core/decision";
import type { Category, Sensitivity } from "../src/types/categories";
import { ACTIONS, restrictiveness, type Action, type CategoryOutcome } from "../src/types/common";

function fired(
  category: Category,
  action: Action,
  duration: number,
  severity = 1,
  sensitivity: Sensitivity = "medium",
): CategoryOutcome {
  return { category, fires: true, action, duration_seconds: duration, severity, sensitivity };
}

function quiet(category: Category): CategoryOutcome {
  return { category, fires: false, action: "none", duration_seconds: 0, severity: 0, sensitivity: "medium" };
}

describe("decision resolver", () => {
  it("returns no match when nothing fires", () => {
    const res = resolve({ language: quiet("language"), sexual: quiet("sexual"), violence: quiet("violence") });
    expect(res).toEqual({ action: "none", duration_seconds: 0, matched_category: null, reason: "No match" });
    expect(resolve({})).toEqual(res);
  });

  it("uses a single firing category verbatim", () => {
    const res = resolve({
      language: fired("language", "mute", 4),
      sexual: quiet("sexual"),
      violence: quiet("violence"),
    });
    expect(res).toEqual({
      action: "mute",
      duration_seconds: 4,
      matched_category: "language",
      reason: "language content detected; sensitivity=medium; severity=1",
    });
  });

  it("reports sexual over language", () => {
    const res = resolve({
      language: fired("language", "mute", 4, 3, "high"),
      sexual: fired("sexual", "mute", 10),
    });
    expect(res.matched_category).toBe("sexual");
    expect(res.action).toBe("mute");
    // equal actions keep the longer duration
    expect(res.duration_seconds).toBe(10);
    expect(res.reason).toBe("sexual content detected; sensitivity=medium; severity=1; also detected=language");
  });

  it("applies the most restrictive action even when it belongs to another category", () => {
    const res = resolve({
      language: fired("language", "mute", 4),
      sexual: fired("sexual", "mute", 10),
      violence: fired("violence", "fast_forward", 15, 2, "high"),
    });
    expect(res).toEqual({
      action: "fast_forward",
      duration_seconds: 15,
      matched_category: "sexual",
      reason: "sexual content detected; sensitivity=medium; severity=1; also detected=violence,language",
    });
  });

  it("is never less restrictive than any firing category", () => {
    const playback = ACTIONS.filter((a) => a !== "none");
    for (const l of playback) {
      for (const s of playback) {
        for (const v of playback) {
          const outcomes = {
            language: fired("language", l, 3),
            sexual: fired("sexual", s, 10),
            violence: fired("violence", v, 5),
          };
          const res = resolve(outcomes);
          expect(res.matched_category).toBe("sexual");
          for (const o of Object.values(outcomes)) {
            expect(restrictiveness(res.action)).toBeGreaterThanOrEqual(restrictiveness(o.action));
          }
        }
      }
    }
  });

  it("breaks restrictiveness ties by duration", () => {
    const best = mostRestrictive([fired("violence", "skip", 20), fired("sexual", "skip", 30)]);
    expect(best?.category).toBe("sexual");
    expect(mostRestrictive([])).toBeUndefined();
  });
});
