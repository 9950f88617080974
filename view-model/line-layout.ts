/**
 * Compute rendered lines: classify through the viewport, then turn each
 * visible line's styled runs into colored tokens.
 */

import { TextBuffer } from '../core/buffer/text-buffer';
import type { ClassificationTag } from '../core/tokenizer/classification';
import { resolveTagColor, resolveTagStyle, tagForClassification } from '../core/tokenizer/token-theme';
import type { EditorTheme } from './theme';

export interface LineToken {
  /** Rendered text, tabs already expanded. */
  text: string;
  classification: ClassificationTag;
  color: string;
  fontStyle: 'normal' | 'italic' | 'bold';
}

export interface RenderedLine {
  lineNumber: number;
  tokens: LineToken[];
}

export interface Viewport {
  firstLine: number;
  lineCount: number;
  /** First visible grapheme column (horizontal scroll). */
  firstColumn: number;
  width: number;
}

/**
 * Compute rendered lines for the viewport. Classification runs only up to
 * the last visible line.
 */
export function computeRenderedLines(
  buffer: TextBuffer,
  viewport: Viewport,
  theme: EditorTheme,
  highlightWord: string | null = null,
): RenderedLine[] {
  const first = Math.max(0, viewport.firstLine);
  const last = Math.min(buffer.lineCount, first + viewport.lineCount) - 1;
  if (last < first) return [];

  buffer.classify(highlightWord, last);

  const lines: RenderedLine[] = [];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    const runs = buffer.render(
      lineNumber,
      viewport.firstColumn,
      viewport.firstColumn + viewport.width,
    );
    lines.push({
      lineNumber,
      tokens: runs.map(run => {
        const tag = tagForClassification(run.tag);
        return {
          text: run.text,
          classification: run.tag,
          color: resolveTagColor(tag, theme.tokens),
          fontStyle: resolveTagStyle(tag),
        };
      }),
    });
  }
  return lines;
}
