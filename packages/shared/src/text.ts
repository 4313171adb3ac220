/** Maximum number of characters (code points) kept in listing previews. */
export const TEXT_PREVIEW_LENGTH = 100;

/**
 * Shortens text for compact job listings.
 *
 * @example
 * ```typescript
 * previewText('a'.repeat(120)); // 'aaaa…a...' (100 chars + '...')
 * previewText('Hello world');   // 'Hello world'
 * ```
 */
export function previewText(text: string, maxLength = TEXT_PREVIEW_LENGTH): string {
  // Count code points so a surrogate pair is never split
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : text;
}
