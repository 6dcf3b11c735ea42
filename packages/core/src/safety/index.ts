export { InvalidLexiconError } from "./errors.js";
export {
  createContentFilter,
  createLexiconGuard,
  DEFAULT_LEXICON_URL,
  findLexiconMatch,
  type LexiconMatch,
  loadDefaultLexicon,
  loadLexicon,
  validateLexicon,
} from "./lexicon.js";
export { type FilterHaystacks, normalizeForFilter } from "./normalize.js";
export {
  type Lexicon,
  LexiconSchema,
  type LexRule,
  LexRuleSchema,
} from "./schema.js";
export type { ContentFilter, FilterVerdict, ReasonCode } from "./types.js";
