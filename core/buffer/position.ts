/**
 * Grapheme-column positions and search direction.
 */

export interface Position {
  /** Zero-based grapheme column. */
  x: number;
  /** Zero-based line index. */
  y: number;
}

export type SearchDirection = 'forward' | 'backward';
