import fs from "node:fs";
import path from "node:path";

import { RulesDocumentSchema } from "../types/schemas";
import { InvalidConfigurationError } from "./errors";
import { CategoryMatcher } from "./matcher";
import { ProfanityCounter } from "./profanity";
import { checkRampConsistency, type EvaluationPolicy } from "./thresholds";

/** Bundled signal sets, profanity words and action ramps; same location from src/ and dist/. */
export const DEFAULT_RULES_PATH = path.resolve(__dirname, "../../data/rules.json");

export interface CompiledRules extends EvaluationPolicy {
  matcher: CategoryMatcher;
}

/** Validate a parsed rules document and build its matcher. `source` labels errors. */
export function compileRules(doc: unknown, source = "rules"): CompiledRules {
  const parsed = RulesDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`${source}: ${issues}`);
  }

  const { thresholds, profanity, signals, actions } = parsed.data;
  const policy: EvaluationPolicy = { thresholds, ramps: actions };
  checkRampConsistency(policy);

  return { ...policy, matcher: new CategoryMatcher(signals, new ProfanityCounter(profanity)) };
}

export function loadRules(file: string = DEFAULT_RULES_PATH): CompiledRules {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new InvalidConfigurationError(`cannot read rules file ${file}: ${(err as Error).message}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigurationError(`rules file ${file} is not valid JSON: ${(err as Error).message}`);
  }

  return compileRules(doc, file);
}

let bundled: CompiledRules | undefined;

/** The bundled rules, compiled on first use. */
export function defaultRules(): CompiledRules {
  bundled ??= loadRules();
  return bundled;
}
