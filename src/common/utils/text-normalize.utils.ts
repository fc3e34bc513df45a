/**
 * Removes diacritics by decomposing to NFD and dropping every code unit outside ASCII.
 * Combining marks go away ("á" -> "a", "ñ" -> "n"); so does any other non-ASCII symbol.
 * Case is preserved: callers lower-case first when they need case-insensitive matching.
 */
export function stripDiacritics(value: string): string {
  return value.normalize('NFD').replace(/[^\u0000-\u007f]/g, '');
}

/**
 * Case and accent insensitive form used for keyword matching.
 */
export function normalizeForKeywordMatch(value: string): string {
  return stripDiacritics(value.toLowerCase());
}
