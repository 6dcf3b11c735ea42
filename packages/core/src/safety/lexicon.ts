import { readFileSync } from "node:fs";
import { InvalidLexiconError } from "./errors.js";
import { normalizeForFilter, type FilterHaystacks } from "./normalize.js";
import { type Lexicon, LexiconSchema, type LexRule } from "./schema.js";
import type { ContentFilter, FilterVerdict, ReasonCode } from "./types.js";

type CompiledRule = LexRule & { regex: RegExp };

export type LexiconMatch = {
  ruleId: string;
  reasonCode: ReasonCode;
  haystack: keyof FilterHaystacks;
  value: string;
};

export const DEFAULT_LEXICON_URL = new URL(
  "../../data/lexicon.json",
  import.meta.url,
);

const compileRules = (rules: LexRule[], errors: string[]): CompiledRule[] => {
  return rules.map((rule) => {
    try {
      const regex = new RegExp(rule.pattern, rule.flags ?? "iu");
      return { ...rule, regex };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`Rule "${rule.id}" invalid regex: ${message}`);
      return { ...rule, regex: /$^/ };
    }
  });
};

/**
 * Checks shape, duplicate ids and that every pattern compiles.
 * Accepts untrusted input, such as freshly parsed JSON.
 */
export function validateLexicon(input: unknown): {
  ok: boolean;
  errors: string[];
} {
  const parsed = LexiconSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      ),
    };
  }

  const errors: string[] = [];
  const seen = new Set<string>();
  for (const rule of parsed.data.rules) {
    if (seen.has(rule.id)) errors.push(`Duplicate rule id "${rule.id}"`);
    seen.add(rule.id);
  }
  compileRules(parsed.data.rules, errors);
  return { ok: errors.length === 0, errors };
}

function compileLexicon(lexicon: Lexicon): CompiledRule[] {
  const result = validateLexicon(lexicon);
  if (!result.ok) {
    throw new InvalidLexiconError(result.errors);
  }
  return compileRules(lexicon.rules, []);
}

function matchRules(
  rules: CompiledRule[],
  text: string,
): LexiconMatch | null {
  const h = normalizeForFilter(text);
  const entries: Array<[keyof FilterHaystacks, string]> = [
    ["raw", h.raw],
    ["folded", h.folded],
    ["lettersOnly", h.lettersOnly],
    ["leet", h.leet],
  ];

  for (const rule of rules) {
    for (const [haystack, value] of entries) {
      if (!value) continue;
      if (rule.regex.test(value)) {
        return { ruleId: rule.id, reasonCode: rule.reasonCode, haystack, value };
      }
    }
  }
  return null;
}

/**
 * Compiles the lexicon once and returns a guard that reports the first
 * rule matching any normalized variant of the text.
 * Throws InvalidLexiconError when the lexicon does not validate.
 */
export function createLexiconGuard(
  lexicon: Lexicon,
): (text: string) => FilterVerdict {
  const rules = compileLexicon(lexicon);
  return (text) => {
    const match = matchRules(rules, text);
    if (!match) return { status: "ok" };
    return {
      status: "blocked",
      reasonCode: match.reasonCode,
      ruleId: match.ruleId,
    };
  };
}

export function findLexiconMatch(
  lexicon: Lexicon,
  text: string,
): LexiconMatch | null {
  return matchRules(compileLexicon(lexicon), text);
}

export function createContentFilter(lexicon: Lexicon): ContentFilter {
  const guard = createLexiconGuard(lexicon);
  return (candidate) => guard(candidate).status === "blocked";
}

/**
 * Reads and validates a lexicon JSON file.
 */
export function loadLexicon(file: string | URL): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  const result = validateLexicon(raw);
  if (!result.ok) {
    throw new InvalidLexiconError(result.errors);
  }
  return LexiconSchema.parse(raw);
}

export function loadDefaultLexicon(): Lexicon {
  return loadLexicon(DEFAULT_LEXICON_URL);
}
