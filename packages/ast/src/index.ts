/**
 * Helena AST - builds trees of typed tokens from source text
 *
 * Every node carries its text, its position and the nodes that may follow
 * it. Rules grow trees through `Branch.expect`, which only attaches a
 * candidate once its text and everything after it have been validated.
 */

export { NodeArena, type NodeId, type NodeRecord } from "./arena";
export { Branch, leaf, type Continuation, type RootOptions } from "./branch";
export { PatternMismatchError, describeMismatch } from "./errors";
export {
  DEFAULT_MAX_LEAFING,
  generateAst,
  type GenerateOptions,
} from "./generator";
export { PatternTable, resolveNewline, validateIdentifier } from "./patterns";
export { nextPosition } from "./position";
export { labelOf, renderTree, type RenderOptions } from "./render";
export { fail, ok, type Result } from "./result";
export {
  identifier,
  listSeparator,
  newline,
  operation,
  spacing,
  typeIdentifier,
} from "./rules/common";
export {
  FUNCTION_DELIMITERS,
  functionDeclaration,
  type FunctionDelimiters,
} from "./rules/function";
export { TOP_LEVEL_RULES, type TopLevelRule } from "./top-level";
