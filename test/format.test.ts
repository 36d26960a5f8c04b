import { InvalidArgumentError } from "commander";
import { describe, it, expect } from "vitest";

import { exitCodeFor, formatDecision, parseFilterLevel, preferencesFromLevels } from "../src/cli/format";
import { evaluateText } from "../src/core/engine";
import { defaultRules } from "../src/core/rules";
import { DEFAULT_PREFERENCES } from "../src/types/schemas";

describe("cli helpers", () => {
  it("maps actions to exit codes", () => {
    expect(exitCodeFor("none")).toBe(0);
    expect(exitCodeFor("mute")).toBe(2);
    expect(exitCodeFor("fast_forward")).toBe(3);
    expect(exitCodeFor("skip")).toBe(4);
  });

  it("parses filter levels", () => {
    expect(parseFilterLevel("HIGH")).toBe("high");
    expect(parseFilterLevel(" off ")).toBe("off");
    expect(() => parseFilterLevel("extreme")).toThrow(InvalidArgumentError);
  });

  it("turns levels into preferences", () => {
    expect(preferencesFromLevels({ language: "off", sexual: "high", violence: "low" })).toEqual({
      language_filter: false,
      sexual_content_filter: true,
      violence_filter: true,
      language_sensitivity: "medium",
      sexual_content_sensitivity: "high",
      violence_sensitivity: "low",
    });
  });

  it("formats a decision with the signals behind it", () => {
    const text = "this is a damn good scene";
    const decision = evaluateText(DEFAULT_PREFERENCES, text);
    expect(formatDecision(decision, defaultRules().matcher.hits(text))).toBe(
      [
        "action: MUTE",
        "duration: 4s",
        "category: language",
        "reason: language content detected; sensitivity=medium; severity=1",
        "signals: damn (language/profanity)",
      ].join("\n"),
    );
  });

  it("formats a quiet decision", () => {
    const decision = evaluateText(DEFAULT_PREFERENCES, "a quiet evening");
    expect(formatDecision(decision)).toBe("action: NONE\nduration: 0s\ncategory: -\nreason: No match");
  });
});
