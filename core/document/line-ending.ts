/**
 * Line ending detection. Saving always writes `\n`; the detected style is
 * kept only as metadata so callers can warn about the conversion.
 */

export type LineEnding = '\n' | '\r\n' | '\r';

/**
 * Detect the line ending style by majority over the first 1000 lines.
 */
export function detectLineEnding(text: string): LineEnding {
  let crlfCount = 0;
  let lfCount = 0;
  let crCount = 0;
  let linesSeen = 0;

  for (let i = 0; i < text.length && linesSeen < 1000; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 13) {
      if (text.charCodeAt(i + 1) === 10) {
        crlfCount++;
        i++;
      } else {
        crCount++;
      }
      linesSeen++;
    } else if (ch === 10) {
      lfCount++;
      linesSeen++;
    }
  }

  if (crlfCount > lfCount && crlfCount > crCount) return '\r\n';
  if (crCount > lfCount && crCount > crlfCount) return '\r';
  return '\n';
}
