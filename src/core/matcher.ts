import { CATEGORIES, type Category, type CategorySeverities } from "../types/categories";
import type { SignalGroup } from "../types/schemas";
import { InvalidConfigurationError } from "./errors";
import { PROFANITY_GROUP, type ProfanityCounter } from "./profanity";

// A signal must not touch a letter, digit or underscore on either side.
const WORD_CHAR = "[\\p{L}\\p{N}_]";

export interface CompiledSignalGroup {
  name: string;
  re: RegExp;
}

export interface SignalHit {
  group: string;
  signal: string;
}

export type CategorySignals = Record<Category, SignalGroup[]>;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Literal term → regex source; inner whitespace matches any whitespace run. */
function termSource(term: string): string {
  return term.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
}

/**
 * One alternation per group, longest terms first so a phrase is counted once
 * rather than once per word it contains. `where` names the group in errors.
 */
export function compileSignalGroup(group: SignalGroup, where: string): CompiledSignalGroup {
  for (const p of group.patterns) {
    try {
      new RegExp(p, "iu");
    } catch (err) {
      throw new InvalidConfigurationError(
        `${where}: invalid pattern ${JSON.stringify(p)} (${(err as Error).message})`,
      );
    }
  }

  const alternatives = [
    ...[...group.terms].sort((a, b) => b.length - a.length).map(termSource),
    ...group.patterns.map((p) => `(?:${p})`),
  ];
  const source = `(?<!${WORD_CHAR})(?:${alternatives.join("|")})(?!${WORD_CHAR})`;

  if (new RegExp(source, "iu").test("")) {
    throw new InvalidConfigurationError(`${where}: a signal matches the empty string`);
  }

  return { name: group.name, re: new RegExp(source, "giu") };
}

function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().split(/\s+/).join(" ");
}

/** A term listed by two groups of one category would score the same span twice. */
function checkDistinctTerms(category: Category, groups: SignalGroup[]): void {
  const owner = new Map<string, string>();
  groups.forEach((g, i) => {
    for (const term of g.terms) {
      const key = normalizeTerm(term);
      const first = owner.get(key);
      if (first !== undefined && first !== g.name) {
        throw new InvalidConfigurationError(
          `signals.${category}[${i}]: term ${JSON.stringify(term)} is already listed in group "${first}"`,
        );
      }
      owner.set(key, g.name);
    }
  });
}

/**
 * Counts signal occurrences per category. Holds only compiled regexes and the
 * profanity filter, and is safe to share: `matchAll` works on a copy of each
 * regex. The profanity filter, when given, adds to the language severity.
 */
export class CategoryMatcher {
  private readonly groups: Record<Category, CompiledSignalGroup[]>;
  private readonly profanity?: ProfanityCounter;

  constructor(signals: CategorySignals, profanity?: ProfanityCounter) {
    for (const c of CATEGORIES) checkDistinctTerms(c, signals[c]);
    this.groups = Object.fromEntries(
      CATEGORIES.map((c) => [
        c,
        signals[c].map((g, i) => compileSignalGroup(g, `signals.${c}[${i}]`)),
      ]),
    ) as Record<Category, CompiledSignalGroup[]>;
    this.profanity = profanity;
  }

  /** Severity per category: non-overlapping hits within a group, summed over groups. */
  match(text: string): CategorySeverities {
    const severities = {} as CategorySeverities;
    for (const c of CATEGORIES) {
      severities[c] = this.groups[c].reduce(
        (sum, g) => sum + Array.from(text.matchAll(g.re)).length,
        0,
      );
    }
    if (this.profanity) severities.language += this.profanity.count(text);
    return severities;
  }

  /** The matched spans themselves, for explanations (CLI, debugging). */
  hits(text: string): Record<Category, SignalHit[]> {
    const out = {} as Record<Category, SignalHit[]>;
    for (const c of CATEGORIES) {
      out[c] = this.groups[c].flatMap((g) =>
        Array.from(text.matchAll(g.re), (m) => ({ group: g.name, signal: m[0].toLowerCase() })),
      );
    }
    if (this.profanity) {
      out.language.push(
        ...this.profanity.profaneWords(text).map((w) => ({ group: PROFANITY_GROUP, signal: w })),
      );
    }
    return out;
  }
}
