import type { NodeKind, Position, TopLevelKind } from "@helena/syntax";

/**
 * Error for text that does not match the pattern required by the kind of
 * node it was offered as. The only error the AST core produces.
 */
export class PatternMismatchError extends Error {
  constructor(
    message: string,
    /** Kind the text was offered as; null when no kind recognised it. */
    public readonly kind: NodeKind | TopLevelKind | null,
    public readonly text: string,
    public readonly position: Position,
    /** Offset into the source, when the error came from a whole-source build. */
    public readonly offset?: number
  ) {
    super(message);
    this.name = "PatternMismatchError";
  }

  withOffset(offset: number): PatternMismatchError {
    return new PatternMismatchError(
      this.message,
      this.kind,
      this.text,
      this.position,
      offset
    );
  }
}

export function describeMismatch(text: string, pattern: string): string {
  return `Textual representation of node (${JSON.stringify(
    text
  )}) does not match ${pattern}.`;
}
