/**
 * Column width of a string literal: one column per Unicode code point.
 * Surrogate pairs count once, so astral characters are not split in two.
 */
export function textWidth(value: string): number {
  let width = 0;
  for (let i = 0; i < value.length; i++) {
    const ch = value.charCodeAt(i);
    // high surrogate followed by low surrogate: one code point
    if (ch >= 0xD800 && ch <= 0xDBFF && i + 1 < value.length) {
      const next = value.charCodeAt(i + 1);
      if (next >= 0xDC00 && next <= 0xDFFF) i++;
    }
    width++;
  }
  return width;
}
