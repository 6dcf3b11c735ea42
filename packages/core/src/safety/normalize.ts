const LEET: Readonly<Record<string, string>> = {
  "0": "o",
  "1": "i",
  "3": "e",
  "4": "a",
  "5": "s",
  "7": "t",
  "@": "a",
  $: "s",
};

const removeDiacritics = (value: string) =>
  value.normalize("NFKD").replace(/\p{Diacritic}+/gu, "");

const lettersOnly = (value: string) => value.replace(/[^\p{L}]+/gu, "");

const decodeLeet = (value: string) =>
  [...value].map((ch) => LEET[ch] ?? ch).join("");

export type FilterHaystacks = {
  raw: string;
  folded: string;
  lettersOnly: string;
  leet: string;
};

/**
 * Variants of the text a lexicon rule is matched against. Passwords run
 * words together and pad them with digits and punctuation, so the
 * variants strip those out.
 */
export function normalizeForFilter(text: string): FilterHaystacks {
  const folded = removeDiacritics(text.normalize("NFKC")).toLowerCase();
  return {
    raw: text,
    folded,
    lettersOnly: lettersOnly(folded),
    leet: lettersOnly(decodeLeet(folded)),
  };
}
