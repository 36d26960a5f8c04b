import { describe, it, expect } from "vitest";
import { CategoryMatcher, compileSignalGroup } from "../src/core/matcher";
import { defaultRules } from "../src/core/rules";
import { InvalidConfigurationError } from "../src/core/errors";
import { ProfanityCounter } from "../src/core/profanity";

const matcher = defaultRules().matcher;

describe("category matcher", () => {
  it("counts a single profanity signal", () => {
    expect(matcher.match("this is a damn good scene")).toEqual({
      language: 1,
      sexual: 0,
      violence: 0,
    });
  });

  it("scores a directed-harm phrase on top of the bare act", () => {
    expect(matcher.match("he shot her twice")).toEqual({ language: 0, sexual: 0, violence: 2 });
    expect(matcher.hits("he shot her twice").violence).toEqual([
      { group: "acts", signal: "shot" },
      { group: "directed", signal: "shot her" },
    ]);
  });

  it("returns zero everywhere for empty or clean text", () => {
    const zero = { language: 0, sexual: 0, violence: 0 };
    expect(matcher.match("")).toEqual(zero);
    expect(matcher.match("Hello, this is a nice day and everything is wonderful.")).toEqual(zero);
  });

  it("is case-insensitive and counts repetitions", () => {
    expect(matcher.match("DAMN it, Damn!").language).toBe(2);
    expect(matcher.match("kill kill kill").violence).toBe(3);
  });

  it("ignores signals embedded in longer words", () => {
    expect(matcher.match("a classic assassin with a shotgun")).toEqual({
      language: 0,
      sexual: 0,
      violence: 0,
    });
  });

  it("treats accented letters as part of the word", () => {
    expect(matcher.match("killé").violence).toBe(0);
  });

  it("counts a phrase once, not once per word", () => {
    expect(matcher.match("son of a bitch").language).toBe(1);
    expect(matcher.match("make   love").sexual).toBe(1);
  });

  it("sums hits across groups of the same category", () => {
    expect(matcher.match("nude and groped").sexual).toBe(2);
  });

  it("scores a shared span once per category", () => {
    const severities = matcher.match("sexual assault");
    expect(severities.sexual).toBe(1);
    expect(severities.violence).toBe(1);
  });

  it("rejects a term listed by two groups of one category", () => {
    expect(
      () =>
        new CategoryMatcher({
          language: [],
          sexual: [
            { name: "explicit", terms: ["sexual"], patterns: [] },
            { name: "assault", terms: ["Sexual"], patterns: [] },
          ],
          violence: [],
        }),
    ).toThrow('signals.sexual[1]: term "Sexual" is already listed in group "explicit"');
  });

  it("reports profane words with surrounding punctuation stripped", () => {
    expect(matcher.hits("DAMN it, Damn!").language).toEqual([
      { group: "profanity", signal: "damn" },
      { group: "profanity", signal: "damn" },
    ]);
  });

  it("rejects invalid and empty-matching patterns", () => {
    expect(() => compileSignalGroup({ name: "g", terms: [], patterns: ["("] }, "signals.x[0]")).toThrow(
      InvalidConfigurationError,
    );
    expect(() => compileSignalGroup({ name: "g", terms: [], patterns: ["a*"] }, "signals.x[0]")).toThrow(
      "signals.x[0]: a signal matches the empty string",
    );
  });

  it("adds and removes profanity words", () => {
    const counter = new ProfanityCounter({ add: ["heck"], remove: ["damn"] });
    expect(counter.profaneWords("Heck, damn heck!")).toEqual(["heck", "heck"]);
    expect(counter.count("damn")).toBe(0);
  });

  it("adds the profanity count to language groups", () => {
    const custom = new CategoryMatcher(
      { language: [{ name: "mild", terms: ["gosh"], patterns: [] }], sexual: [], violence: [] },
      new ProfanityCounter({ add: ["heck"], remove: [] }),
    );
    expect(custom.match("gosh heck")).toEqual({ language: 2, sexual: 0, violence: 0 });
  });

  it("works with custom signal sets", () => {
    const custom = new CategoryMatcher({
      language: [{ name: "mild", terms: ["heck"], patterns: [] }],
      sexual: [{ name: "s", terms: ["smooch"], patterns: [] }],
      violence: [{ name: "v", terms: [], patterns: ["bonk(?:ed)?"] }],
    });
    expect(custom.match("Heck, he bonked him and bonk again")).toEqual({
      language: 1,
      sexual: 0,
      violence: 2,
    });
  });
});
