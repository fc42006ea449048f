/**
 * Cut a string to at most `maxLength` UTF-16 code units, marker included.
 *
 * @remarks
 * Strings that already fit are returned unchanged. The cut never splits a
 * surrogate pair.
 *
 * @example
 * ```typescript
 * truncateString('abcdefgh', 6, '...'); // => 'abc...'
 * truncateString('abc', 6, '...'); // => 'abc'
 * ```
 */
export const truncateString = (value: string, maxLength: number, marker: string): string => {
  if (value.length <= maxLength) {
    return value;
  }

  let cut = Math.max(0, maxLength - marker.length);
  const lastKept = value.charCodeAt(cut - 1);
  if (cut > 0 && lastKept >= 0xd800 && lastKept <= 0xdbff) {
    cut -= 1;
  }

  return value.slice(0, cut) + marker;
};
