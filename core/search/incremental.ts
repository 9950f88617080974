/**
 * Incremental search session over a TextBuffer.
 *
 * Keeps the query and the current match. `next()` resumes just after the
 * current match and `prev()` just before it; both wrap around the buffer
 * once. The query doubles as the highlight word for classification.
 */

import { TextBuffer } from '../buffer/text-buffer';
import type { Position, SearchDirection } from '../buffer/position';

export class IncrementalSearch {
  private _query: string = '';
  private _current: Position | null = null;
  private _origin: Position;

  constructor(private buffer: TextBuffer, origin: Position = { x: 0, y: 0 }) {
    this._origin = { ...origin };
  }

  get query(): string {
    return this._query;
  }

  get currentMatch(): Position | null {
    return this._current;
  }

  /** Word to pass to `TextBuffer.classify`, or null when there is no query. */
  get highlightWord(): string | null {
    return this._query.length > 0 ? this._query : null;
  }

  /**
   * Replace the query and search forward from where the session started.
   */
  setQuery(query: string): Position | null {
    this._query = query;
    this._current = null;
    if (query.length === 0) return null;
    return this.search(this._origin, 'forward');
  }

  /** Move to the next match after the current one. */
  next(): Position | null {
    if (this._query.length === 0) return null;
    const from = this._current ? { x: this._current.x + 1, y: this._current.y } : this._origin;
    return this.search(from, 'forward');
  }

  /** Move to the previous match before the current one. */
  prev(): Position | null {
    if (this._query.length === 0) return null;
    return this.search(this._current ?? this._origin, 'backward');
  }

  /** Abandon the search; returns the position the session started from. */
  cancel(): Position {
    this._query = '';
    this._current = null;
    return { ...this._origin };
  }

  private search(from: Position, direction: SearchDirection): Position | null {
    let match = this.buffer.find(this._query, from, direction);
    if (match === null && this.buffer.lineCount > 0) {
      // Wrap around
      const lastLine = this.buffer.lineCount - 1;
      const wrapFrom = direction === 'forward'
        ? { x: 0, y: 0 }
        : { x: this.buffer.getLineLength(lastLine), y: lastLine };
      match = this.buffer.find(this._query, wrapFrom, direction);
    }
    if (match !== null) this._current = match;
    return match;
  }
}
