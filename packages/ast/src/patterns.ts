import { EOL } from "node:os";
import {
  LIST_SEPARATOR,
  NEWLINES,
  NodeKind,
  SPACE,
  START_POSITION,
  isKeyword,
  isLineTerminator,
  type LineTerminator,
  type NewlineStyle,
  type Position,
} from "@helena/syntax";
import { PatternMismatchError, describeMismatch } from "./errors";
import { fail, ok, type Result } from "./result";

type Pattern =
  | { type: "literal"; value: string }
  | { type: "regex"; value: RegExp }
  | { type: "keyword" };

const IDENTIFIER = /^[A-Za-z0-9]+$/;
const TYPE_IDENTIFIER = /^[A-Za-z0-9_]+(?:\[\])*$/;
const OPERATION = /^\w+$/;

export function resolveNewline(style: NewlineStyle = "platform"): LineTerminator {
  if (style === "platform") {
    return EOL === NEWLINES.crlf ? NEWLINES.crlf : NEWLINES.lf;
  }
  return NEWLINES[style];
}

/**
 * Patterns by which the text of each kind of node is recognised. The line
 * terminator is fixed when the table is created, once per build.
 */
export class PatternTable {
  private readonly patterns: Record<NodeKind, Pattern>;

  constructor(public readonly newline: LineTerminator = resolveNewline()) {
    if (!isLineTerminator(newline)) {
      throw new Error(`Unsupported line terminator ${JSON.stringify(newline)}`);
    }
    this.patterns = {
      [NodeKind.Anchor]: { type: "literal", value: "" },
      [NodeKind.Keyword]: { type: "keyword" },
      [NodeKind.Identifier]: { type: "regex", value: IDENTIFIER },
      [NodeKind.TypeIdentifier]: { type: "regex", value: TYPE_IDENTIFIER },
      [NodeKind.Spacing]: { type: "literal", value: SPACE },
      [NodeKind.Newline]: { type: "literal", value: newline },
      [NodeKind.ListSeparator]: { type: "literal", value: LIST_SEPARATOR },
      [NodeKind.Operation]: { type: "regex", value: OPERATION },
    };
  }

  /**
   * Checks `text` against the pattern of `kind`. Keywords are compared with
   * `expected` when given and with the keyword table otherwise.
   */
  validate(
    kind: NodeKind,
    text: string,
    position: Position = START_POSITION,
    expected?: string
  ): Result<string> {
    const pattern = this.patterns[kind];
    if (matches(pattern, text, expected)) {
      return ok(text);
    }
    return fail(
      new PatternMismatchError(
        mismatchMessage(kind, pattern, text, expected),
        kind,
        text,
        position
      )
    );
  }
}

function matches(pattern: Pattern, text: string, expected?: string): boolean {
  switch (pattern.type) {
    case "literal":
      return text === pattern.value;
    case "regex":
      return pattern.value.test(text);
    case "keyword":
      return expected === undefined ? isKeyword(text) : text === expected;
  }
}

function mismatchMessage(
  kind: NodeKind,
  pattern: Pattern,
  text: string,
  expected?: string
): string {
  if (kind === NodeKind.Identifier || kind === NodeKind.TypeIdentifier) {
    if (text === "") {
      return "Expected an identifier.";
    }
    return `${text} is invalid. An identifier can only contain letters A–Z and digits.`;
  }
  switch (pattern.type) {
    case "literal":
      return describeMismatch(text, JSON.stringify(pattern.value));
    case "regex":
      return describeMismatch(text, String(pattern.value));
    case "keyword":
      return describeMismatch(
        text,
        expected === undefined ? "any keyword" : JSON.stringify(expected)
      );
  }
}

const defaultTable = new PatternTable(NEWLINES.lf);

export function validateIdentifier(text: string): Result<string> {
  return defaultTable.validate(NodeKind.Identifier, text);
}
