import { SourceLocation } from './errors';

/**
 * Document text plus a line index, so character offsets can be turned into
 * row/column locations for diagnostics.
 */
export class SourceText {
  readonly text: string;
  readonly source?: string | undefined;
  private readonly lineStarts: number[];

  constructor(text: string, source?: string) {
    this.text = text;
    this.source = source;
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i += 1) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get length(): number {
    return this.text.length;
  }

  locate(offset: number): SourceLocation {
    const actual = clamp(offset, 0, this.text.length);
    const index = this.lineIndexOf(actual);
    const start = this.lineStarts[index] ?? 0;
    const next = this.lineStarts[index + 1];
    const end = next === undefined ? this.text.length : next - 1;
    return {
      source: this.source,
      offset: actual,
      row: index + 1,
      column: actual - start + 1,
      lineText: this.text.slice(start, end).replace(/\r$/, ''),
    };
  }

  private lineIndexOf(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}
