import type { Position } from "@helena/syntax";

/**
 * Cursor over a source buffer that hands out the text slices the grammar
 * rules validate. It never decides whether a slice is well-formed; that is
 * left to the patterns of the node kinds the slices are offered as.
 */
export class SourceReader {
  private index = 0;
  private mark = 0;

  constructor(private readonly source: string) {}

  offset(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.source.length;
  }

  peek(offset = 0): string | undefined {
    return this.source[this.index + offset];
  }

  startsWith(text: string): boolean {
    return text !== "" && this.source.startsWith(text, this.index);
  }

  /**
   * Consumes up to `length` characters. Near the end of the source the slice
   * is shorter, possibly empty.
   */
  take(length: number): string {
    const text = this.source.slice(this.index, this.index + length);
    this.index += text.length;
    return text;
  }

  /**
   * Consumes characters until one of `stops` or the end of the line. The
   * stop itself is left in place.
   */
  readUntil(stops: readonly string[]): string {
    const start = this.index;
    while (!this.isAtEnd()) {
      const next = this.peek();
      if (next === undefined || next === "\n" || next === "\r") break;
      if (stops.some((stop) => this.startsWith(stop))) break;
      this.index += 1;
    }
    return this.source.slice(start, this.index);
  }

  /** Remainder of the current line from the cursor, without consuming it. */
  restOfLine(): string {
    const rest = this.source.slice(this.index);
    const end = rest.search(/\r?\n/);
    return end === -1 ? rest : rest.slice(0, end);
  }

  /** Starts a new production at the cursor. */
  begin(): void {
    this.mark = this.index;
  }

  /** Text consumed since the last {@link begin}. */
  consumed(): string {
    return this.source.slice(this.mark, this.index);
  }
}

/**
 * Converts an offset into the source to a line and an in-line offset, as
 * text editors count them. Used for diagnostics only.
 */
export function locate(source: string, offset: number): Position {
  let column = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let index = 0; index < end; index += 1) {
    if (source[index] === "\n") {
      column += 1;
      lineStart = index + 1;
    }
  }
  return { column, row: end - lineStart };
}

export type { Position };
