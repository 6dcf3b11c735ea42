import type { PuzzleSeed } from "../puzzle/look-and-say.js";
import { isPrime } from "../puzzle/primality.js";

export type StaticRuleId =
  | "min-length"
  | "digit"
  | "uppercase"
  | "special"
  | "fibonacci"
  | "morse"
  | "month"
  | "roman"
  | "digit-sum-prime"
  | "sicilian";

/**
 * A password rule is plain data. Its predicate is looked up by id, and
 * the one rule that depends on the session is given the seed explicitly
 * by `checkRule` instead of closing over it.
 */
export type PasswordRule =
  | { kind: "static"; id: StaticRuleId; message: string }
  | { kind: "lookAndSay"; id: "look-and-say"; message: string };

export type RuleId = PasswordRule["id"];

export type Catalog = readonly PasswordRule[];

export const FIBONACCI_NUMBERS = [
  0, 1, 2, 3, 5, 8, 13, 21, 34, 55, 89, 144, 233, 377, 610, 987,
] as const;

export const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

export const ROMAN_NUMERALS = ["I", "V", "X", "L", "C", "D", "M"] as const;

const DIGIT = /[0-9]/;
const UPPERCASE = /\p{Lu}/u;
const NOT_LETTER_OR_DIGIT = /[^\p{L}\p{N}]/u;

export function digitSum(text: string): number {
  let sum = 0;
  for (const ch of text) {
    if (ch >= "0" && ch <= "9") sum += ch.charCodeAt(0) - 48;
  }
  return sum;
}

export const STATIC_PREDICATES: Readonly<
  Record<StaticRuleId, (text: string) => boolean>
> = {
  "min-length": (text) => [...text].length >= 5,
  digit: (text) => DIGIT.test(text),
  uppercase: (text) => UPPERCASE.test(text),
  special: (text) => NOT_LETTER_OR_DIGIT.test(text),
  fibonacci: (text) => FIBONACCI_NUMBERS.some((n) => text.includes(String(n))),
  morse: (text) => text.includes(".") || text.includes("-"),
  month: (text) => {
    const lower = text.toLowerCase();
    return MONTHS.some((month) => lower.includes(month));
  },
  roman: (text) => ROMAN_NUMERALS.some((numeral) => text.includes(numeral)),
  "digit-sum-prime": (text) => isPrime(digitSum(text)),
  sicilian: (text) => text.includes("c5"),
};

export function checkRule(
  rule: PasswordRule,
  text: string,
  seed: PuzzleSeed,
): boolean {
  switch (rule.kind) {
    case "static":
      return STATIC_PREDICATES[rule.id](text);
    case "lookAndSay":
      return text.includes(seed.nextSequence);
  }
}

/**
 * Message shown to the player. Only the look-and-say message varies per
 * session; "{lastSequence}" is replaced with the seed's term.
 */
export function renderRuleMessage(rule: PasswordRule, seed: PuzzleSeed): string {
  if (rule.kind === "lookAndSay") {
    return rule.message.replace("{lastSequence}", seed.lastSequence);
  }
  return rule.message;
}

/**
 * The gating order. Changing the order changes the game.
 */
export const DEFAULT_CATALOG: Catalog = [
  {
    kind: "static",
    id: "min-length",
    message: "Password must be at least 5 characters long.",
  },
  { kind: "static", id: "digit", message: "Password must include a number." },
  {
    kind: "static",
    id: "uppercase",
    message: "Password must include an uppercase letter.",
  },
  {
    kind: "static",
    id: "special",
    message: "Password must include a special character.",
  },
  {
    kind: "static",
    id: "fibonacci",
    message: "Password must include a number from the Fibonacci sequence.",
  },
  { kind: "static", id: "morse", message: "Include a Morse code character." },
  {
    kind: "static",
    id: "month",
    message: "Your password must include a month of the year.",
  },
  {
    kind: "lookAndSay",
    id: "look-and-say",
    message: "Enter the next sequence in Look-and-Say after {lastSequence}",
  },
  {
    kind: "static",
    id: "roman",
    message: "Your password must include a Roman numeral.",
  },
  {
    kind: "static",
    id: "digit-sum-prime",
    message: "The sum of all numbers in the password must be a prime number.",
  },
  {
    kind: "static",
    id: "sicilian",
    message: "Respond to e4 with the Sicilian Defense.",
  },
];
