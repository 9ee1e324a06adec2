/**
 * A contiguous run of letter/apostrophe characters inside a sentence,
 * identifying one occurrence of a word.
 *
 * Offsets are UTF-16 code unit indices (the same indices `String.prototype.slice`
 * takes). The range is half open: `sentence.slice(start, end)` is the token.
 */
export interface TokenSpan {
  start: number;
  end: number;
}
