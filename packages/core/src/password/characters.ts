/**
 * Punctuation the input accepts besides letters and digits.
 */
export const ALLOWED_PUNCTUATION: ReadonlySet<string> = new Set([
  "-", "_", "!", "@", "#", "$", "%", "^", "&", "*", "(", ")", "=", "+",
  "[", "]", "{", "}", ";", ":", "'", '"', ",", "<", ".", ">", "/", "?", "|",
]);

const LETTER_OR_NUMBER = /^[\p{L}\p{N}]$/u;

/**
 * True for a single code point that is a letter, a number, or one of
 * `ALLOWED_PUNCTUATION`.
 */
export function isAllowedCharacter(ch: string): boolean {
  if ([...ch].length !== 1) return false;
  return LETTER_OR_NUMBER.test(ch) || ALLOWED_PUNCTUATION.has(ch);
}

/**
 * Drops the last code point, so a surrogate pair is removed whole.
 */
export function dropLastCharacter(text: string): string {
  if (text.length === 0) return text;
  const chars = [...text];
  chars.pop();
  return chars.join("");
}
