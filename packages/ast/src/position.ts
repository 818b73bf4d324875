import { ROW_CEILING, type Position } from "@helena/syntax";

/**
 * Obtains the position of a node whose text is `consumedText`, following a
 * node at `current`. The row lands where that text ends.
 *
 * The column only advances when the next row is 0, which only empty text
 * after a node at row 0 produces.
 */
export function nextPosition(
  current: Position,
  consumedText: string
): Position {
  const row = Math.min(current.row + consumedText.length, ROW_CEILING);
  const column =
    current.column > 0 && row === 0 ? current.column + 1 : current.column;
  return { column, row };
}
