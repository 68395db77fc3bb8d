/**
 * Lowercase, turn anything that is not a letter or digit into a space and
 * split. `"How's our Q3 pipeline?"` → `['how', 's', 'our', 'q3', 'pipeline']`.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter((t) => t.length > 0);
}

/**
 * Searchable form of a text: tokens joined by single spaces and padded, so a
 * phrase matches only on whole-word boundaries.
 */
export function toSearchText(text: string): string {
  return ` ${tokenize(text).join(' ')} `;
}

/** True when every token of `term` appears, in order and adjacent, in the search text. */
export function containsTerm(searchText: string, term: string): boolean {
  const needle = tokenize(term).join(' ');
  if (needle.length === 0) return false;
  return searchText.includes(` ${needle} `);
}
