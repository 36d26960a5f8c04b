import { describe, it, expect } from "vitest";
import { DecisionEngine, parseUserId } from "../src/core/engine";
import { InvalidConfigurationError } from "../src/core/errors";
import type { PreferencesLookup } from "../src/store/preferences";
import { DEFAULT_PREFERENCES, type Preferences } from "../src/types/schemas";

class FakeStore implements PreferencesLookup {
  private prefs: Map<number, Preferences>;
  private delayMs: number;
  private failure: Error | null;

  constructor(prefs: Record<number, Preferences>, delayMs = 0, failure: Error | null = null) {
    this.prefs = new Map();
    for (const [k, v] of Object.entries(prefs)) this.prefs.set(Number(k), v);
    this.delayMs = delayMs;
    this.failure = failure;
  }

  async getPreferences(userId: number): Promise<Preferences | null> {
    if (this.delayMs) await new Promise((res) => setTimeout(res, this.delayMs));
    if (this.failure) throw this.failure;
    return this.prefs.get(userId) ?? null;
  }
}

function makePrefs(overrides: Partial<Preferences> = {}): Preferences {
  return { ...DEFAULT_PREFERENCES, ...overrides };
}

function engineFor(prefs: Preferences, opts: { delayMs?: number; failure?: Error } = {}) {
  return new DecisionEngine(new FakeStore({ 1: prefs }, opts.delayMs, opts.failure ?? null), {
    lookupTimeoutMs: 50,
  });
}

const unknownUser = { action: "none", duration_seconds: 0, matched_category: null, reason: "Unknown user_id" };

describe("decision engine", () => {
  it("mutes a single profanity at medium", async () => {
    const res = await engineFor(makePrefs()).decide(1, "this is a damn good scene");
    expect(res).toEqual({
      action: "mute",
      duration_seconds: 4,
      matched_category: "language",
      reason: "language content detected; sensitivity=medium; severity=1",
    });
  });

  it("fires violence at low sensitivity once two signals are present", async () => {
    const res = await engineFor(makePrefs({ violence_sensitivity: "low" })).decide(1, "he shot her twice");
    expect(res).toEqual({
      action: "mute",
      duration_seconds: 5,
      matched_category: "violence",
      reason: "violence content detected; sensitivity=low; severity=2",
    });
  });

  it("ignores violence when the filter is off", async () => {
    const res = await engineFor(makePrefs({ violence_sensitivity: "low", violence_filter: false })).decide(
      1,
      "he shot her twice",
    );
    expect(res).toEqual({ action: "none", duration_seconds: 0, matched_category: null, reason: "No match" });
  });

  it("returns no match for clean text", async () => {
    const res = await engineFor(makePrefs()).decide(1, "Lovely sunny afternoon with friends");
    expect(res).toEqual({ action: "none", duration_seconds: 0, matched_category: null, reason: "No match" });
  });

  it("reports sexual while applying the stricter violence action", async () => {
    const res = await engineFor(makePrefs()).decide(1, "This damn violent sexual scene");
    expect(res).toEqual({
      action: "fast_forward",
      duration_seconds: 10,
      matched_category: "sexual",
      reason: "sexual content detected; sensitivity=medium; severity=1; also detected=violence,language",
    });
  });

  it("skips strong sexual content ahead of violence", async () => {
    const res = await engineFor(makePrefs()).decide(
      1,
      "Explicit sexual content and sexual scene with a violent fight and strong language",
    );
    expect(res).toEqual({
      action: "skip",
      duration_seconds: 30,
      matched_category: "sexual",
      reason: "sexual content detected; sensitivity=medium; severity=3; also detected=violence",
    });
  });

  it("accepts numeric ids as strings", async () => {
    const engine = engineFor(makePrefs());
    expect(await engine.decide("1", "damn")).toEqual(await engine.decide(1, "damn"));
  });

  it("is a pure function of its inputs", async () => {
    const engine = engineFor(makePrefs({ language_sensitivity: "high" }));
    const text = "damn damn damn, he was killed";
    expect(await engine.decide(1, text)).toEqual(await engine.decide(1, text));
  });

  it("treats unknown or malformed user ids as unknown users", async () => {
    const engine = engineFor(makePrefs());
    expect(await engine.decide("9999999", "damn")).toEqual(unknownUser);
    expect(await engine.decide("nope", "damn")).toEqual(unknownUser);
    expect(await engine.decide(0, "damn")).toEqual(unknownUser);
  });

  it("falls back to unknown user when the lookup is too slow", async () => {
    const res = await engineFor(makePrefs(), { delayMs: 200 }).decide(1, "damn");
    expect(res).toEqual(unknownUser);
  });

  it("falls back to unknown user when the store fails", async () => {
    const res = await engineFor(makePrefs(), { failure: new Error("disk on fire") }).decide(1, "damn");
    expect(res).toEqual(unknownUser);
  });

  it("reports invalid stored configuration in-band", async () => {
    const res = await engineFor(makePrefs(), {
      failure: new InvalidConfigurationError("stored preferences for user 1 are invalid"),
    }).decide(1, "damn");
    expect(res).toEqual({
      action: "none",
      duration_seconds: 0,
      matched_category: null,
      reason: "Invalid configuration",
    });

    const corrupt: Preferences = JSON.parse(
      JSON.stringify({ ...DEFAULT_PREFERENCES, language_sensitivity: "extreme" }),
    );
    expect((await engineFor(corrupt).decide(1, "damn")).reason).toBe("Invalid configuration");
  });

  it("answers simple mode with just the action", async () => {
    const engine = engineFor(makePrefs());
    expect(await engine.analyze(1, "This is damn stupid")).toEqual({ action: "mute" });
    expect(await engine.analyze(9999, "This is damn stupid")).toEqual({ action: "none" });
  });

  describe("event payloads", () => {
    const engine = engineFor(makePrefs());
    const invalid = { action: "none", duration_seconds: 0, matched_category: null, reason: "Invalid request" };

    it("rejects missing or mistyped fields", async () => {
      expect(await engine.handleEvent({ text: "missing user id" })).toEqual(invalid);
      expect(await engine.handleEvent({ user_id: 1 })).toEqual(invalid);
      expect(await engine.handleEvent({ user_id: 1, text: 5 })).toEqual(invalid);
      expect(await engine.handleEvent({ user_id: true, text: "x" })).toEqual(invalid);
      expect(await engine.handleEvent(null)).toEqual(invalid);
    });

    it("validates confidence range", async () => {
      expect(await engine.handleEvent({ user_id: 1, text: "damn", confidence: 1.5 })).toEqual(invalid);
    });

    it("passes confidence through without changing the decision", async () => {
      const withConfidence = await engine.handleEvent({ user_id: "1", text: "damn", confidence: 0.2 });
      const without = await engine.handleEvent({ user_id: 1, text: "damn" });
      expect(withConfidence).toEqual(without);
      expect(without.action).toBe("mute");
    });
  });
});

describe("parseUserId", () => {
  it("accepts positive integers and digit strings", () => {
    expect(parseUserId(42)).toBe(42);
    expect(parseUserId("42")).toBe(42);
    expect(parseUserId(" 7 ")).toBe(7);
  });

  it("rejects everything else", () => {
    for (const bad of ["nope", "", "1e3", "-1", 0, -1, 1.5, Number.NaN]) {
      expect(parseUserId(bad)).toBeNull();
    }
  });
});
