import type { FunctionDeclaration } from "@helena/syntax";
import { leaf, type Branch, type Continuation } from "../branch";
import type { Result } from "../result";

/**
 * Text found in the source at the fixed positions of a declaration. Rules
 * built from values rather than source leave them at their defaults.
 */
export type FunctionDelimiters = {
  keyword: string;
  space: string;
  open: string;
  close: string;
  scope: string;
  bodySpace: string;
};

export const FUNCTION_DELIMITERS: Readonly<FunctionDelimiters> = {
  keyword: "func",
  space: " ",
  open: "(",
  close: ")",
  scope: ":",
  bodySpace: " ",
};

/**
 * Declaration of a function confined to a single line:
 *
 *   func name(type name, type name):
 *   func name(): body
 *
 * The parameter list is folded from the right onto the closing parenthesis,
 * so the last parameter leads straight to `)` and every other one leads to a
 * list separator and then to the parameter after it.
 */
export function functionDeclaration(
  branch: Branch,
  declaration: FunctionDeclaration,
  delimiters: Readonly<FunctionDelimiters> = FUNCTION_DELIMITERS
): Result<Branch> {
  const { name, parameters, body } = declaration;

  const scope: Continuation =
    body === undefined
      ? leaf
      : (delimiter) =>
          delimiter.expectSpace(
            (space) => space.expectOperation(body, leaf),
            delimiters.bodySpace
          );

  const close: Continuation = (node) =>
    node.expectKeyword(
      ")",
      (paren) => paren.expectKeyword(":", scope, delimiters.scope),
      delimiters.close
    );

  const parameterList = parameters.reduceRight<Continuation>(
    (next, parameter, index) => {
      const isLast = index === parameters.length - 1;
      return (node) =>
        node.expectTypeIdentifier(parameter.typeName, (type) =>
          type.expectSpace((space) =>
            space.expectIdentifier(
              parameter.identifier,
              isLast ? next : (value) => value.expectListSeparator(next)
            )
          )
        );
    },
    close
  );

  return branch.expectKeyword(
    "func",
    (keyword) =>
      keyword.expectSpace(
        (space) =>
          space.expectIdentifier(name, (identifier) =>
            identifier.expectKeyword("(", parameterList, delimiters.open)
          ),
        delimiters.space
      ),
    delimiters.keyword
  );
}
