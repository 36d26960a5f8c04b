import Filter from "bad-words";
import type { ProfanityWords } from "../types/schemas";

/** Group name reported for words flagged by the profanity filter. */
export const PROFANITY_GROUP = "profanity";

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Word-by-word profanity count on top of the `bad-words` list, with the
 * rules file adding and removing words.
 */
export class ProfanityCounter {
  private readonly filter: Filter;

  constructor(words: ProfanityWords) {
    this.filter = new Filter();
    if (words.add.length) this.filter.addWords(...words.add);
    if (words.remove.length) this.filter.removeWords(...words.remove);
  }

  /** Flagged words, lowercased and stripped of surrounding punctuation. */
  profaneWords(text: string): string[] {
    return text
      .split(/\s+/)
      .map((w) => w.replace(EDGE_PUNCTUATION, "").toLowerCase())
      .filter((w) => w !== "" && this.filter.isProfane(w));
  }

  count(text: string): number {
    return this.profaneWords(text).length;
  }
}
