/**
 * Folds text to printable ASCII: NFKD-decomposes, drops combining marks and
 * anything outside ASCII, then collapses whitespace.
 */
export function cleanText(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .replace(/[\x00-\x1F\x7F]/g, '')
    .trim();
}

export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}
