/** Opening quote characters recognized at submission, mapped to the character that closes them. */
export const QUOTE_PAIRS: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['“', '"'],
  ['‘', "'"],
  ['`', '`'],
]);

/**
 * Folds typographic quotes into their ASCII form so that trigger and quote
 * comparisons do not depend on the host's punctuation auto-correction.
 */
export const normalizeQuotes = (value: string) =>
  value.replace(/[“”]/g, '"').replace(/[‘’]/g, "'");

export const extractQuestion = (remainder: string) => {
  let text = normalizeQuotes(remainder).trim();
  const closing = QUOTE_PAIRS.get(text.charAt(0));
  if (closing !== undefined) {
    text = text.slice(1);
    const end = text.indexOf(closing);
    if (end >= 0) text = text.slice(0, end);
  }
  return text.trim();
};
