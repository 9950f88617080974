/**
 * High-level TextBuffer API over an ordered list of lines.
 *
 * This is the public interface for all text operations. It coordinates
 * cross-line edits (newline splits, backspace merges), tracks whether the
 * content differs from the last save, searches across line boundaries and
 * drives re-classification after edits.
 *
 * Edits at invalid positions are dropped silently; none of the editing,
 * search or classification calls throw.
 */

import { Line } from './line';
import type { Position, SearchDirection } from './position';
import { Classifier } from '../tokenizer/classifier';
import type { StyledRun } from '../tokenizer/classification';
import { LanguageProfile, PLAIN_TEXT_PROFILE } from '../language/profile';

/**
 * Split loaded text into line contents. Lines end at `\n`; one trailing
 * `\r` per line is dropped and a final terminator does not start an extra
 * empty line. Empty text has no lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/** Whether both coordinates are non-negative integers. */
function isCell({ x, y }: Position): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0;
}

export class TextBuffer {
  private lines: Line[];
  private dirty: boolean = false;
  private classifier: Classifier;

  constructor(lines: Line[] = [], profile: LanguageProfile = PLAIN_TEXT_PROFILE) {
    this.lines = lines;
    this.classifier = new Classifier(profile);
  }

  /** Build a buffer from loaded file text. The result is not dirty. */
  static fromText(text: string, profile: LanguageProfile = PLAIN_TEXT_PROFILE): TextBuffer {
    return new TextBuffer(splitLines(text).map(line => Line.fromText(line)), profile);
  }

  /** Total number of lines in the buffer. */
  get lineCount(): number {
    return this.lines.length;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get profile(): LanguageProfile {
    return this.classifier.profile;
  }

  /** Mark the current content as saved. */
  markSaved(): void {
    this.dirty = false;
  }

  /**
   * Switch language profile. Every line's classification becomes stale.
   */
  setProfile(profile: LanguageProfile): void {
    if (profile === this.classifier.profile) return;
    this.classifier = new Classifier(profile);
    this.invalidateFrom(0);
  }

  /** The line at index `y`, or null when out of range. */
  getLine(y: number): Line | null {
    return this.lines[y] ?? null;
  }

  /** Content of line `y` (empty string when out of range). */
  getLineText(y: number): string {
    return this.lines[y]?.text ?? '';
  }

  /** Grapheme length of line `y` (0 when out of range). */
  getLineLength(y: number): number {
    return this.lines[y]?.length ?? 0;
  }

  /**
   * Full content in the save format: every line followed by one `\n`.
   */
  getText(): string {
    return this.lines.map(line => line.text + '\n').join('');
  }

  /**
   * Insert one grapheme, or split the line when `unit` is `\n`.
   * Row `lineCount` is accepted and appends a new line; rows beyond it,
   * negative or fractional coordinates, and units carrying a line break
   * other than a lone `\n` are ignored. Use `insertText` for runs of text.
   */
  insert(position: Position, unit: string): void {
    const { x, y } = position;
    if (!isCell(position) || y > this.lines.length || unit.length === 0) return;
    if (unit !== '\n' && /[\r\n]/.test(unit)) return;
    this.dirty = true;

    if (unit === '\n') {
      this.insertNewline(position);
    } else if (y === this.lines.length) {
      this.lines.push(Line.fromText(unit));
    } else {
      this.lines[y].insert(x, unit);
    }

    this.invalidateFrom(y);
  }

  /**
   * Insert a run of text grapheme by grapheme, splitting lines at `\n`.
   * Returns the position just after the inserted text.
   */
  insertText(position: Position, text: string): Position {
    let { x, y } = position;
    if (!isCell(position) || y > this.lines.length) return { x, y };
    x = Math.min(x, this.getLineLength(y));

    const normalized = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
    for (const segment of Line.fromText(normalized).units) {
      this.insert({ x, y }, segment);
      if (segment === '\n') {
        y++;
        x = 0;
      } else {
        x++;
      }
    }
    return { x, y };
  }

  /**
   * Delete the grapheme at `position`. At the end of a line that has a
   * successor, the next line is merged into this one instead.
   */
  delete(position: Position): void {
    const { x, y } = position;
    if (!isCell(position) || y >= this.lines.length) return;
    this.dirty = true;

    const line = this.lines[y];
    if (x === line.length && y + 1 < this.lines.length) {
      const [next] = this.lines.splice(y + 1, 1);
      line.append(next);
    } else {
      line.delete(x);
    }

    this.invalidateFrom(y);
  }

  /**
   * Find `query` starting at `from`, moving across lines in `direction`.
   * Crossing into the next line restarts at column 0 (forward) or at the
   * end of the line (backward).
   */
  find(query: string, from: Position, direction: SearchDirection): Position | null {
    let { x, y } = from;
    if (!isCell(from) || y >= this.lines.length) return null;

    while (y >= 0 && y < this.lines.length) {
      const column = this.lines[y].find(query, x, direction);
      if (column !== null) return { x: column, y };

      if (direction === 'forward') {
        y++;
        x = 0;
      } else {
        y--;
        if (y < 0) break;
        x = this.lines[y].length;
      }
    }
    return null;
  }

  /**
   * Re-classify from line 0 through `until` (inclusive, clamped to the
   * buffer), or the whole buffer when `until` is omitted, carrying the
   * multi-line comment state from line to line. `word` is the active
   * search term to overlay.
   *
   * @returns The number of lines whose base classification was rescanned.
   */
  classify(word: string | null = null, until?: number): number {
    const end = until === undefined
      ? this.lines.length
      : Math.max(0, Math.min(until + 1, this.lines.length));

    let inComment = false;
    let rescanned = 0;
    for (let y = 0; y < end; y++) {
      const line = this.lines[y];
      if (!this.classifier.isUpToDate(line, inComment)) rescanned++;
      inComment = this.classifier.classify(line, word, inComment);
    }
    return rescanned;
  }

  /** Styled runs of line `y` for the grapheme range [start, end). */
  render(y: number, start: number, end: number): StyledRun[] {
    return this.lines[y]?.render(start, end) ?? [];
  }

  private insertNewline(position: Position): void {
    if (position.y === this.lines.length) {
      this.lines.push(Line.fromText());
      return;
    }
    const rest = this.lines[position.y].split(position.x);
    this.lines.splice(position.y + 1, 0, rest);
  }

  /**
   * Mark lines stale from the line before `y` to the end; the line before
   * may have its comment state changed by the edit.
   */
  private invalidateFrom(y: number): void {
    for (let i = Math.max(y - 1, 0); i < this.lines.length; i++) {
      this.lines[i].invalidate();
    }
  }
}
