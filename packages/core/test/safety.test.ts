import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { InvalidLexiconError } from "../src/safety/errors.js";
import {
  createContentFilter,
  createLexiconGuard,
  findLexiconMatch,
  loadDefaultLexicon,
  loadLexicon,
  validateLexicon,
} from "../src/safety/lexicon.js";
import { normalizeForFilter } from "../src/safety/normalize.js";
import { type Lexicon, ReasonCodeSchema } from "../src/safety/schema.js";
import type { ReasonCode } from "../src/safety/types.js";

const lexicon: Lexicon = {
  version: "test",
  rules: [
    { id: "test-bad", reasonCode: "profanity", pattern: "badword" },
    { id: "test-gross", reasonCode: "other", pattern: "gr+o+s+s" },
  ],
};

describe("normalizeForFilter", () => {
  it("builds every haystack variant", () => {
    expect(normalizeForFilter("B4d.Wörd!")).toEqual({
      raw: "B4d.Wörd!",
      folded: "b4d.word!",
      lettersOnly: "bdword",
      leet: "badword",
    });
  });
});

describe("createLexiconGuard", () => {
  const guard = createLexiconGuard(lexicon);

  it("lets clean text through", () => {
    expect(guard("May111221.c5")).toEqual({ status: "ok" });
  });

  it("blocks matches case-insensitively", () => {
    expect(guard("xBADWORDx")).toEqual({
      status: "blocked",
      reasonCode: "profanity",
      ruleId: "test-bad",
    });
    expect(guard("grrrooss")).toEqual({
      status: "blocked",
      reasonCode: "other",
      ruleId: "test-gross",
    });
  });

  it("throws on a lexicon that does not validate", () => {
    expect(() =>
      createLexiconGuard({
        version: "test",
        rules: [{ id: "broken", reasonCode: "other", pattern: "(" }],
      }),
    ).toThrow(InvalidLexiconError);
  });
});

describe("findLexiconMatch", () => {
  it("reports which variant matched", () => {
    expect(findLexiconMatch(lexicon, "bad.word")).toEqual({
      ruleId: "test-bad",
      reasonCode: "profanity",
      haystack: "lettersOnly",
      value: "badword",
    });
    expect(findLexiconMatch(lexicon, "b4dw0rd")?.haystack).toBe("leet");
    expect(findLexiconMatch(lexicon, "bädword")?.haystack).toBe("folded");
    expect(findLexiconMatch(lexicon, "harmless")).toBeNull();
  });
});

describe("ReasonCode", () => {
  it("is the set of codes the lexicon schema accepts", () => {
    const codes: readonly ReasonCode[] = ReasonCodeSchema.options;
    expect(codes).toEqual(["profanity", "slur", "sexual", "other"]);
    const parsed: ReasonCode = ReasonCodeSchema.parse("slur");
    expect(parsed).toBe("slur");
  });
});

describe("validateLexicon", () => {
  it("accepts a well-formed lexicon", () => {
    expect(validateLexicon(lexicon)).toEqual({ ok: true, errors: [] });
  });

  it("reports patterns that do not compile", () => {
    const result = validateLexicon({
      version: "test",
      rules: [{ id: "broken", reasonCode: "other", pattern: "(" }],
    });
    expect(result.ok).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Rule "broken" invalid regex: /);
  });

  it("reports stateful flags and duplicate ids", () => {
    expect(
      validateLexicon({
        version: "test",
        rules: [{ id: "a", reasonCode: "other", pattern: "x", flags: "g" }],
      }).errors,
    ).toEqual(["rules.0.flags: only i, m, s and u flags are supported"]);

    expect(
      validateLexicon({
        version: "test",
        rules: [
          { id: "a", reasonCode: "other", pattern: "x" },
          { id: "a", reasonCode: "other", pattern: "y" },
        ],
      }).errors,
    ).toEqual(['Duplicate rule id "a"']);
  });

  it("reports schema errors by path", () => {
    const result = validateLexicon({ version: "test", rules: [{ id: "a" }] });
    expect(result.ok).toBe(false);
    expect(result.errors.every((e) => e.startsWith("rules.0."))).toBe(true);
  });
});

describe("lexicon files", () => {
  it("loads and validates a file", () => {
    const dir = mkdtempSync(join(tmpdir(), "passgate-"));
    const good = join(dir, "good.json");
    const bad = join(dir, "bad.json");
    writeFileSync(good, JSON.stringify(lexicon));
    writeFileSync(bad, JSON.stringify({ rules: [] }));

    expect(loadLexicon(good)).toEqual(lexicon);
    expect(() => loadLexicon(bad)).toThrow(InvalidLexiconError);
  });

  it("ships a default lexicon that passes clean passwords", () => {
    const isDisallowed = createContentFilter(loadDefaultLexicon());
    expect(isDisallowed("May111221.c5")).toBe(false);
    expect(isDisallowed("JuneI1112213.")).toBe(false);
    expect(isDisallowed("sh1t")).toBe(true);
  });
});
