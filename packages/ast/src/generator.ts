import { SourceReader } from "@helena/lexer";
import {
  ROW_CEILING,
  START_POSITION,
  TOP_LEVEL_KINDS,
  TopLevelKind,
  type AstNode,
  type MaxLeafing,
  type NewlineStyle,
  type Position,
} from "@helena/syntax";
import { Branch } from "./branch";
import { PatternMismatchError, describeMismatch } from "./errors";
import { PatternTable, resolveNewline } from "./patterns";
import { nextPosition } from "./position";
import { fail, ok, type Result } from "./result";
import { TOP_LEVEL_RULES, type TopLevelRule } from "./top-level";

export interface GenerateOptions {
  /** Caps per top-level kind; kinds left out are unlimited. */
  maxLeafing?: Partial<MaxLeafing>;
  /** Line terminator of the source (default: the platform's) */
  newline?: NewlineStyle;
  /** Productions tried at every unconsumed offset, in order. */
  rules?: readonly TopLevelRule[];
}

export const DEFAULT_MAX_LEAFING: Readonly<MaxLeafing> = {
  [TopLevelKind.FunctionDeclaration]: Number.POSITIVE_INFINITY,
  [TopLevelKind.Newline]: Number.POSITIVE_INFINITY,
};

/**
 * Builds the trees of every top-level production in `source`, in order.
 *
 * Generation is all or nothing. The first mismatch fails the whole source,
 * and so do a production that cannot end, one appearing more often than its
 * cap allows and text no production recognises.
 */
export function generateAst(
  source: string,
  options: GenerateOptions = {}
): Result<AstNode[]> {
  const patterns = new PatternTable(resolveNewline(options.newline));
  const maxLeafing = resolveMaxLeafing(options.maxLeafing);
  const counts = new Map<TopLevelKind, number>();
  const reader = new SourceReader(source);
  const rules = options.rules ?? TOP_LEVEL_RULES;
  const roots: AstNode[] = [];
  let position: Position = START_POSITION;

  while (!reader.isAtEnd()) {
    const start = reader.offset();
    const rule = rules.find((candidate) =>
      candidate.recognizes(reader)
    );

    if (!rule) {
      const text = reader.restOfLine();
      return fail(
        new PatternMismatchError(
          describeMismatch(text, "any top-level declaration"),
          null,
          text,
          position,
          start
        )
      );
    }

    reader.begin();
    const anchor = Branch.root({ patterns, position });
    const built = rule.build(reader, anchor);
    const checked = built.ok ? anchor.checkTermination() : built;
    if (!checked.ok) {
      return fail(
        checked.error.withOffset(sourceOffset(checked.error, start, position))
      );
    }

    const consumed = reader.consumed();
    const count = (counts.get(rule.kind) ?? 0) + 1;
    const cap = maxLeafing[rule.kind];
    if (count > cap) {
      return fail(
        new PatternMismatchError(
          `${rule.kind} may appear at most ${cap} time(s) at the top level.`,
          rule.kind,
          consumed,
          position,
          start
        )
      );
    }
    counts.set(rule.kind, count);

    const [root] = anchor.successors();
    if (root) {
      roots.push(root.toNode());
    }
    position = nextPosition(position, consumed);
  }

  return ok(roots);
}

function resolveMaxLeafing(overrides: Partial<MaxLeafing> = {}): MaxLeafing {
  const resolved: MaxLeafing = { ...DEFAULT_MAX_LEAFING };
  for (const kind of TOP_LEVEL_KINDS) {
    const cap = overrides[kind];
    if (cap === undefined) continue;
    if (cap < 0 || !(Number.isInteger(cap) || cap === Number.POSITIVE_INFINITY)) {
      throw new RangeError(
        `Max leafing of ${kind} must be a non-negative integer, got ${cap}`
      );
    }
    resolved[kind] = cap;
  }
  return resolved;
}

/**
 * Maps the position of a mismatch back to an offset into the source. A
 * node's row is where its text ends, counted from the start of the
 * production until it reaches the ceiling, past which only the start of the
 * production is known.
 */
function sourceOffset(
  error: PatternMismatchError,
  start: number,
  anchor: Position
): number {
  if (error.position.row >= ROW_CEILING) {
    return start;
  }
  return (
    start + Math.max(0, error.position.row - error.text.length - anchor.row)
  );
}
