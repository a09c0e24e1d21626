/**
 * Text Metrics
 *
 * Contract for the host's text measurement, plus a fixed-width
 * approximation used when no measurer is supplied.
 */

import type { Size } from "./types";

export interface TextMeasurer {
  /** Height of a single line of text */
  readonly lineHeight: number;

  /** Size of `text` laid out without word wrap (newlines still break lines) */
  measure(text: string): Size;

  /** Height of `text` word-wrapped to `maxWidth` */
  measureWrapped(text: string, maxWidth: number): number;
}

export interface FixedWidthMeasurerOptions {
  fontSize?: number;
  /** Advance of every character. Defaults to 0.6 * fontSize */
  charWidth?: number;
  /** Defaults to 1.5 * fontSize */
  lineHeight?: number;
}

/**
 * Measurer that treats every character as the same width.
 */
export function createFixedWidthMeasurer(options: FixedWidthMeasurerOptions = {}): TextMeasurer {
  const fontSize = options.fontSize ?? 14;
  const charWidth = options.charWidth ?? fontSize * 0.6;
  const lineHeight = options.lineHeight ?? fontSize * 1.5;

  return {
    lineHeight,

    measure(text: string): Size {
      if (text.length === 0) return { width: 0, height: 0 };
      const lines = text.split("\n");
      const longest = Math.max(...lines.map((line) => line.length));
      return { width: longest * charWidth, height: lines.length * lineHeight };
    },

    measureWrapped(text: string, maxWidth: number): number {
      if (text.length === 0) return 0;
      const maxChars = Math.max(1, Math.floor(maxWidth / charWidth));
      let lines = 0;
      for (const paragraph of text.split("\n")) {
        lines += countWrappedLines(paragraph, maxChars);
      }
      return lines * lineHeight;
    },
  };
}

/**
 * Greedy word wrap. Words longer than a line are broken across lines.
 */
export function countWrappedLines(paragraph: string, maxChars: number): number {
  const words = paragraph.split(" ").filter((word) => word.length > 0);
  if (words.length === 0) return 1;

  let lines = 1;
  let current = 0;
  for (const word of words) {
    const needed = current === 0 ? word.length : current + 1 + word.length;
    if (needed <= maxChars) {
      current = needed;
      continue;
    }
    if (current > 0) {
      lines++;
    }
    // Hard-break long words; the remainder starts the current line
    lines += Math.ceil(word.length / maxChars) - 1;
    current = word.length % maxChars || maxChars;
  }
  return lines;
}

/** Measurer used when neither an element nor its ancestors supply one */
export const DEFAULT_TEXT_MEASURER: TextMeasurer = createFixedWidthMeasurer();
