import type { SourceReader } from "@helena/lexer";
import {
  LIST_SEPARATOR,
  NEWLINES,
  SPACE,
  TopLevelKind,
  type ValueParameter,
} from "@helena/syntax";
import type { Branch } from "./branch";
import { newline } from "./rules/common";
import { functionDeclaration, type FunctionDelimiters } from "./rules/function";
import type { Result } from "./result";

/**
 * Production that may stand on its own at the top level of a source file.
 */
export interface TopLevelRule {
  kind: TopLevelKind;
  /** Whether the text at the cursor starts this production. */
  recognizes(reader: SourceReader): boolean;
  /** Reads the text of the production and builds it onto `anchor`. */
  build(reader: SourceReader, anchor: Branch): Result<Branch>;
}

const functionRule: TopLevelRule = {
  kind: TopLevelKind.FunctionDeclaration,

  recognizes(reader) {
    return reader.startsWith("func");
  },

  build(reader, anchor) {
    const keyword = reader.take(4);
    const space = reader.take(1);
    const name = reader.readUntil(["("]);
    const open = reader.take(1);
    const parameters = readParameters(reader.readUntil([")"]));
    const close = reader.take(1);
    const scope = reader.take(1);

    let body: string | undefined;
    let bodySpace = SPACE;
    if (reader.peek() === SPACE) {
      bodySpace = reader.take(1);
      body = reader.readUntil([]);
    }

    const delimiters: FunctionDelimiters = {
      keyword,
      space,
      open,
      close,
      scope,
      bodySpace,
    };
    return functionDeclaration(anchor, { name, parameters, body }, delimiters);
  },
};

function readParameters(text: string): ValueParameter[] {
  if (text === "") {
    return [];
  }
  return text.split(LIST_SEPARATOR).map((parameter) => {
    const space = parameter.indexOf(SPACE);
    if (space === -1) {
      return { typeName: parameter, identifier: "" };
    }
    return {
      typeName: parameter.slice(0, space),
      identifier: parameter.slice(space + 1),
    };
  });
}

const newlineRule: TopLevelRule = {
  kind: TopLevelKind.Newline,

  recognizes(reader) {
    return reader.startsWith(NEWLINES.lf) || reader.startsWith(NEWLINES.crlf);
  },

  build(reader, anchor) {
    const text = reader.take(reader.startsWith(NEWLINES.crlf) ? 2 : 1);
    return newline(anchor, text);
  },
};

/** Tried in order at every unconsumed offset. */
export const TOP_LEVEL_RULES: readonly TopLevelRule[] = [
  functionRule,
  newlineRule,
];
