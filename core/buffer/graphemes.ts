/**
 * Grapheme cluster segmentation.
 *
 * Every column, length and tag index in the editor counts extended grapheme
 * clusters. ASCII-only text takes a fast path where one code unit is one
 * cluster.
 */

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function isAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) return false;
  }
  return true;
}

/** Split text into grapheme clusters. */
export function splitGraphemes(text: string): string[] {
  if (isAscii(text)) return text.split('');
  const units: string[] = [];
  for (const { segment } of graphemeSegmenter.segment(text)) {
    units.push(segment);
  }
  return units;
}

/** Number of grapheme clusters in text. */
export function graphemeCount(text: string): number {
  if (isAscii(text)) return text.length;
  let count = 0;
  for (const _segment of graphemeSegmenter.segment(text)) {
    count++;
  }
  return count;
}

/**
 * Code unit offset of every cluster boundary of the joined units, including
 * 0 and the total length. offsets[i] is where cluster i starts.
 */
export function unitOffsets(units: readonly string[]): number[] {
  const boundaries: number[] = [];
  let offset = 0;
  for (const unit of units) {
    boundaries.push(offset);
    offset += unit.length;
  }
  boundaries.push(offset);
  return boundaries;
}

/** ASCII punctuation or ASCII whitespace. */
export function isSeparator(unit: string | undefined): boolean {
  if (unit === undefined || unit.length !== 1) return false;
  const ch = unit.charCodeAt(0);
  if (ch === 32 || ch === 9 || ch === 10 || ch === 12 || ch === 13) return true;
  if (ch >= 33 && ch <= 47) return true;  // !"#$%&'()*+,-./
  if (ch >= 58 && ch <= 64) return true;  // :;<=>?@
  if (ch >= 91 && ch <= 96) return true;  // [\]^_`
  if (ch >= 123 && ch <= 126) return true; // {|}~
  return false;
}

/** ASCII decimal digit. */
export function isDigit(unit: string | undefined): boolean {
  if (unit === undefined || unit.length !== 1) return false;
  const ch = unit.charCodeAt(0);
  return ch >= 48 && ch <= 57;
}
