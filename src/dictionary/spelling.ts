/**
 * Drop a trailing disambiguation suffix: "LEAD(2)" → "LEAD".
 * Only applies when the word ends in ')' and the last '(' is past index 0.
 */
export function removeParensFromWord(word: string): string {
  if (word.endsWith(')')) {
    const index = word.lastIndexOf('(');
    if (index > 0) return word.slice(0, index);
  }
  return word;
}

/** Map a raw spelling to its dictionary key. */
export function normalizeSpelling(word: string): string {
  return removeParensFromWord(word).toLowerCase();
}
