/** A lexicon failed schema validation or contains a pattern that does not compile. */
export class InvalidLexiconError extends Error {
  constructor(readonly errors: string[]) {
    super(`Invalid lexicon: ${errors.join(" | ")}`);
    this.name = "InvalidLexiconError";
  }
}
