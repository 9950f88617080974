/**
 * A single editable line: its text, cached grapheme count and the
 * classification produced by the last scan.
 *
 * All positions are grapheme columns. Edits rebuild the content from the
 * grapheme sequence and recount it, so the cached length always matches
 * the number of clusters in the text.
 */

import { unitOffsets, splitGraphemes } from './graphemes';
import type { SearchDirection } from './position';
import type {
  ClassificationTag,
  LineClassification,
  StyledRun,
} from '../tokenizer/classification';

/**
 * stale: needs a scan.
 * fresh: scanned, not ending inside an open multi-line comment.
 * pending: scanned, ends inside an open multi-line comment; rescanned on
 * every classification pass so the comment keeps propagating.
 */
export type ClassificationState = 'stale' | 'fresh' | 'pending';

export class Line {
  private _text: string;
  private _units: string[];
  private _classification: LineClassification | null = null;
  private _tags: ClassificationTag[] = [];

  private constructor(text: string) {
    this._text = text;
    this._units = splitGraphemes(text);
  }

  static fromText(text: string = ''): Line {
    return new Line(text);
  }

  get text(): string {
    return this._text;
  }

  /** Number of grapheme clusters. */
  get length(): number {
    return this._units.length;
  }

  get units(): readonly string[] {
    return this._units;
  }

  /** Tags shown for this line: base classification plus the search overlay. */
  get tags(): readonly ClassificationTag[] {
    return this._tags;
  }

  get classification(): LineClassification | null {
    return this._classification;
  }

  get state(): ClassificationState {
    if (this._classification === null) return 'stale';
    return this._classification.endsInComment ? 'pending' : 'fresh';
  }

  /**
   * Insert text before the grapheme at `at`, or append when `at` is at or
   * past the end.
   */
  insert(at: number, text: string): void {
    if (text.length === 0 || !Number.isInteger(at) || at < 0) return;
    if (at >= this.length) {
      this.setText(this._text + text);
    } else {
      const units = [...this._units];
      units.splice(at, 0, text);
      this.setText(units.join(''));
    }
    this.invalidate();
  }

  /** Remove the grapheme at `at`. No-op past the end or off a column. */
  delete(at: number): void {
    if (!Number.isInteger(at) || at < 0 || at >= this.length) return;
    const units = [...this._units];
    units.splice(at, 1);
    this.setText(units.join(''));
    this.invalidate();
  }

  /**
   * Keep the graphemes before `at` and return the rest as a new line.
   * Both halves need a fresh scan.
   */
  split(at: number): Line {
    const cut = Math.max(0, Math.min(at, this.length));
    const suffix = this._units.slice(cut).join('');
    this.setText(this._units.slice(0, cut).join(''));
    this.invalidate();
    return new Line(suffix);
  }

  /** Concatenate another line's text onto this one. Classification is left to the caller. */
  append(other: Line): void {
    this.setText(this._text + other._text);
  }

  /**
   * Styled runs for the grapheme range [start, end). Tabs render as two
   * spaces; neighbouring graphemes with the same tag share a run.
   */
  render(start: number, end: number): StyledRun[] {
    const stop = Math.max(0, Math.min(end, this.length));
    const from = Math.max(0, Math.min(start, stop));
    const runs: StyledRun[] = [];
    let current: StyledRun | null = null;

    for (let i = from; i < stop; i++) {
      const unit = this._units[i];
      const text = unit === '\t' ? '  ' : unit;
      const tag = this._tags[i] ?? 'None';
      if (current && current.tag === tag) {
        current.text += text;
      } else {
        current = { text, tag };
        runs.push(current);
      }
    }
    return runs;
  }

  /**
   * Find `query` within [at, length) going forward, or within [0, at)
   * going backward. Returns the grapheme column of the match start.
   * Occurrences that start or end inside a grapheme cluster are skipped.
   */
  find(query: string, at: number, direction: SearchDirection): number | null {
    if (query.length === 0 || !Number.isInteger(at) || at < 0 || at > this.length) return null;

    const [start, end] = direction === 'forward' ? [at, this.length] : [0, at];
    const units = this._units.slice(start, end);
    const window = units.join('');
    const columnAt = new Map<number, number>();
    unitOffsets(units).forEach((offset, column) => columnAt.set(offset, column));

    const matchColumn = (offset: number): number | null => {
      const column = columnAt.get(offset);
      if (column === undefined || !columnAt.has(offset + query.length)) return null;
      return start + column;
    };

    if (direction === 'forward') {
      let offset = window.indexOf(query);
      while (offset !== -1) {
        const column = matchColumn(offset);
        if (column !== null) return column;
        offset = window.indexOf(query, offset + 1);
      }
    } else {
      let offset = window.lastIndexOf(query);
      while (offset !== -1) {
        const column = matchColumn(offset);
        if (column !== null) return column;
        offset = offset > 0 ? window.lastIndexOf(query, offset - 1) : -1;
      }
    }
    return null;
  }

  /** Drop the cached classification; the next pass rescans this line. */
  invalidate(): void {
    this._classification = null;
  }

  /** Store a fresh scan result. */
  setClassification(classification: LineClassification): void {
    this._classification = classification;
  }

  /** Replace the displayed tags (base classification plus search overlay). */
  setTags(tags: ClassificationTag[]): void {
    this._tags = tags;
  }

  private setText(text: string): void {
    this._text = text;
    this._units = splitGraphemes(text);
  }
}

