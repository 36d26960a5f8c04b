#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import fs from "node:fs";
import readline from "node:readline";

import { loadConfig } from "../config";
import { DecisionEngine, evaluateText } from "../core/engine";
import { defaultRules, loadRules, type CompiledRules } from "../core/rules";
import { SqlitePreferencesStore } from "../store/sqlite";
import type { Decision } from "../types/common";
import { createLogger } from "../util/log";
import {
  exitCodeFor,
  formatDecision,
  parseFilterLevel,
  preferencesFromLevels,
  type FilterLevel,
} from "./format";

const program = new Command();

program
  .name("playback-filter")
  .description("Decide a playback action (none, mute, fast_forward, skip) for caption text")
  .argument("[text...]", "caption text (omit when using --file)")
  .option("-f, --file <jsonl>", "JSONL file with {\"text\":\"...\"} per line")
  .option("--language <level>", "language filter: low|medium|high|off", parseFilterLevel, "medium")
  .option("--sexual <level>", "sexual content filter: low|medium|high|off", parseFilterLevel, "medium")
  .option("--violence <level>", "violence filter: low|medium|high|off", parseFilterLevel, "medium")
  .option("-u, --user <id>", "use the stored preferences of this user instead of the level flags")
  .option("--db <path>", "SQLite database for --user (defaults to DATABASE_PATH)")
  .option("--rules <path>", "rules JSON (defaults to RULES_PATH or the bundled rules)")
  .option("--json", "print raw JSON decision(s)", false)
  .parse(process.argv);

type CliOpts = {
  file?: string;
  language: FilterLevel;
  sexual: FilterLevel;
  violence: FilterLevel;
  user?: string;
  db?: string;
  rules?: string;
  json?: boolean;
};

type Decider = {
  decide(text: string): Promise<Decision>;
  rules: CompiledRules;
  close(): void;
};

function buildDecider(opts: CliOpts): Decider {
  const config = loadConfig();
  const rulesPath = opts.rules ?? config.RULES_PATH;
  const rules = rulesPath ? loadRules(rulesPath) : defaultRules();

  if (opts.user) {
    const userId = opts.user;
    const store = new SqlitePreferencesStore(opts.db ?? config.DATABASE_PATH);
    const engine = new DecisionEngine(store, {
      rules,
      lookupTimeoutMs: config.LOOKUP_TIMEOUT_MS,
      logger: createLogger("cli", config.LOG_LEVEL),
    });
    return { rules, decide: (text) => engine.decide(userId, text), close: () => store.close() };
  }

  const preferences = preferencesFromLevels({
    language: opts.language,
    sexual: opts.sexual,
    violence: opts.violence,
  });
  return { rules, decide: async (text) => evaluateText(preferences, text, rules), close: () => {} };
}

function printDecision(decider: Decider, text: string, decision: Decision, jsonMode: boolean) {
  if (jsonMode) {
    process.stdout.write(JSON.stringify(decision) + "\n");
    return;
  }
  process.stdout.write(formatDecision(decision, decider.rules.matcher.hits(text)) + "\n");
}

async function handleSingle(decider: Decider, text: string, opts: CliOpts): Promise<number> {
  const decision = await decider.decide(text);
  printDecision(decider, text, decision, !!opts.json);
  return exitCodeFor(decision.action);
}

async function handleBatch(decider: Decider, file: string, opts: CliOpts): Promise<number> {
  if (!fs.existsSync(file)) {
    console.error(`[error] file not found: ${file}`);
    return 1;
  }

  const rl = readline.createInterface({
    input: fs.createReadStream(file, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  let worstExit = 0;
  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let text: string;
    try {
      const obj: unknown = JSON.parse(trimmed);
      if (typeof obj !== "object" || obj === null || !("text" in obj) || typeof obj.text !== "string") {
        throw new Error("missing text");
      }
      text = obj.text;
    } catch {
      console.error(`[warn] skipping invalid JSONL line: ${trimmed.slice(0, 120)}`);
      continue;
    }

    const decision = await decider.decide(text);
    printDecision(decider, text, decision, !!opts.json);
    worstExit = Math.max(worstExit, exitCodeFor(decision.action));
  }
  return worstExit;
}

(async () => {
  const opts = program.opts<CliOpts>();
  const textParts = program.args;
  const inline = textParts.length ? textParts.join(" ") : "";

  if (opts.file && inline) {
    console.error("[error] Provide either TEXT args or --file, not both.");
    process.exit(1);
  }
  if (!opts.file && !inline) {
    program.help({ error: true });
  }

  let code = 1;
  let decider: Decider | undefined;
  try {
    decider = buildDecider(opts);
    code = opts.file ? await handleBatch(decider, opts.file, opts) : await handleSingle(decider, inline, opts);
  } catch (err) {
    console.error(`[error] ${String((err as Error).message || err)}`);
  } finally {
    decider?.close();
  }
  process.exit(code);
})();
