/**
 * String helpers that count code points, not UTF-16 units.
 */

/**
 * Keep the first `maxLength` code points of `text`.
 *
 * A surrogate pair is never split, so an emoji at the boundary is
 * either kept whole or dropped.
 */
export function truncateCodePoints(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const points = Array.from(text);
  return points.length > maxLength ? points.slice(0, Math.max(0, maxLength)).join('') : text;
}
