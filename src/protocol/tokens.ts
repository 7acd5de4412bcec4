/**
 * Whitespace token count. An approximation used for `usage`, not a tokenizer:
 * runs of whitespace separate tokens and leading/trailing whitespace is ignored.
 *
 * Examples:
 *   "Hello world"      → 2
 *   "  a \n\t b  "     → 2
 *   ""                 → 0
 */
export function countTokens(text: string): number {
  const trimmed = text.trim();
  if (trimmed === '') return 0;
  return trimmed.split(/\s+/).length;
}
