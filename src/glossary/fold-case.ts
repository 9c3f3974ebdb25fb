/**
 * Case folding shared by alias generation and matching, so a phrase and the
 * text it is searched in are folded the same way.
 */

/**
 * Lowercase without shifting offsets. A character whose lowercase form has a
 * different length (e.g. "İ") is kept as it is.
 */
export function foldCase(text: string): string {
  const lowered = text.toLowerCase();
  if (lowered.length === text.length) return lowered;

  let out = '';
  for (const ch of text) {
    const low = ch.toLowerCase();
    out += low.length === ch.length ? low : ch;
  }
  return out;
}
