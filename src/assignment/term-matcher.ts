/**
 * Whole-word / whole-phrase term matching over lower-cased text.
 *
 * A term matches when no letter or digit comes directly before it and,
 * after an optional inflection (s, es, ed, ing), none comes directly after.
 * So "printer" matches "printers", "crash" matches "crashed", "ad" matches
 * "ad sync" but not "load" or "add", and "down" does not match "download".
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const INFLECTION = '(?:s|es|ed|ing)?';

export type TermMatcher = (text: string) => boolean;

export function compileTerm(term: string): TermMatcher {
  const escaped = term.toLowerCase().trim().replace(REGEX_SPECIALS, '\\$&');
  const pattern = new RegExp(`(?<![a-z0-9])${escaped}${INFLECTION}(?![a-z0-9])`);
  return (text) => pattern.test(text);
}

/** Lower-cased title + description, the only text extraction looks at */
export function ticketText(ticket: { title: string; description: string }): string {
  return `${ticket.title} ${ticket.description}`.toLowerCase();
}
