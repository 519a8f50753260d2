// Control characters that are not whitespace; whitespace is collapsed instead.
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000E-\u001F\u007F]/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Strips control characters, collapses whitespace runs to a single space and
 * trims. `cleanText(cleanText(x)) === cleanText(x)`.
 */
export function cleanText(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '').replace(WHITESPACE_RUN, ' ').trim();
}
