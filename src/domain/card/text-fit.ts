/**
 * Fit a line of text into a fixed width: shrink the font in steps down to a
 * floor, then cut characters and append an ellipsis. Text is never allowed to
 * run past maxWidth.
 */

export type MeasureText = (text: string, fontSize: number) => number;

export interface FitOptions {
  maxWidth: number;
  fontSize: number;
  minFontSize: number;
  step?: number;
}

export interface FittedText {
  text: string;
  fontSize: number;
  truncated: boolean;
}

export const ELLIPSIS = '…';

export function fitText(text: string, options: FitOptions, measure: MeasureText): FittedText {
  const step = options.step ?? 2;

  for (let size = options.fontSize; size >= options.minFontSize; size -= step) {
    if (measure(text, size) <= options.maxWidth) {
      return { text, fontSize: size, truncated: false };
    }
  }

  // Cut on code points so a surrogate pair is never split
  const chars = Array.from(text);
  const fontSize = options.minFontSize;
  for (let length = chars.length - 1; length > 0; length--) {
    const candidate = chars.slice(0, length).join('').trimEnd() + ELLIPSIS;
    if (measure(candidate, fontSize) <= options.maxWidth) {
      return { text: candidate, fontSize, truncated: true };
    }
  }

  return { text: ELLIPSIS, fontSize, truncated: true };
}
