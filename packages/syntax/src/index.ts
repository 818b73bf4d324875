export type Position = {
  /** 1-based number of the line in which a node starts. */
  column: number;
  /** 0-based offset of a node within its line, capped at {@link ROW_CEILING}. */
  row: number;
};

/** Offsets past this value collapse onto it. */
export const ROW_CEILING = 100;

export const START_POSITION: Position = { column: 1, row: 0 };

export enum NodeKind {
  Anchor = "Anchor",
  Keyword = "Keyword",
  Identifier = "Identifier",
  TypeIdentifier = "TypeIdentifier",
  Spacing = "Spacing",
  Newline = "Newline",
  ListSeparator = "ListSeparator",
  Operation = "Operation",
}

export const KEYWORDS = ["func", "(", ")", ":"] as const;

export type Keyword = (typeof KEYWORDS)[number];

const KEYWORD_SET = new Set<string>(KEYWORDS);

export function isKeyword(value: string): value is Keyword {
  return KEYWORD_SET.has(value);
}

export const SPACE = " ";

export const LIST_SEPARATOR = ", ";

// ===== Line terminators =====

export const NEWLINES = {
  lf: "\n",
  crlf: "\r\n",
} as const;

export const NEWLINE_STYLES = ["lf", "crlf", "platform"] as const;

export type NewlineStyle = (typeof NEWLINE_STYLES)[number];

export type LineTerminator = (typeof NEWLINES)[keyof typeof NEWLINES];

export function isLineTerminator(value: string): value is LineTerminator {
  return value === NEWLINES.lf || value === NEWLINES.crlf;
}

// ===== Top-level productions =====

/**
 * Kinds of production that may stand on their own at the top level of a
 * source file.
 */
export enum TopLevelKind {
  FunctionDeclaration = "FunctionDeclaration",
  Newline = "Newline",
}

export const TOP_LEVEL_KINDS: readonly TopLevelKind[] = [
  TopLevelKind.FunctionDeclaration,
  TopLevelKind.Newline,
];

/**
 * Maximum amount of standalone top-level appearances per production kind.
 * 0 means the kind only ever appears nested inside another production.
 */
export type MaxLeafing = Record<TopLevelKind, number>;

export function isTopLevelKind(value: string): value is TopLevelKind {
  return (TOP_LEVEL_KINDS as readonly string[]).includes(value);
}

// ===== Trees =====

/**
 * Finished node of the tree. `null` in `continuations` marks that the
 * production may end at this node; every other entry is a successor.
 */
export type AstNode = {
  readonly kind: NodeKind;
  readonly text: string;
  readonly column: number;
  readonly row: number;
  readonly continuations: ReadonlyArray<AstNode | null>;
};

/**
 * Declaration of a parameter passed into a function as a value.
 */
export type ValueParameter = {
  /** Name of the type as written, qualified or not (e.g. `string[]`). */
  typeName: string;
  identifier: string;
};

export type FunctionDeclaration = {
  name: string;
  parameters: ValueParameter[];
  /** Single-line body following the scope delimiter, if any. */
  body?: string;
};
