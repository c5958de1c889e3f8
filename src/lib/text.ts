// src/lib/text.ts

/** First `max` characters of `text`, counted in code points. */
export function truncateChars(text: string, max: number): string {
  // a string never has more code points than UTF-16 units
  if (text.length <= max) return text;

  let units = 0;
  let count = 0;
  for (const ch of text) {
    if (count === max) break;
    units += ch.length;
    count++;
  }
  return text.slice(0, units);
}
