import { leaf, type Branch } from "../branch";
import type { Result } from "../result";

// Single-token productions. Each may end right after its token; composite
// rules reach the same tokens through the `expect*` methods of `Branch`.

export function identifier(branch: Branch, text: string): Result<Branch> {
  return branch.expectIdentifier(text, leaf);
}

export function typeIdentifier(branch: Branch, text: string): Result<Branch> {
  return branch.expectTypeIdentifier(text, leaf);
}

export function spacing(branch: Branch, text?: string): Result<Branch> {
  return branch.expectSpace(leaf, text);
}

/** Line break in the terminator selected for the build, unless `text` is given. */
export function newline(branch: Branch, text?: string): Result<Branch> {
  return branch.expectNewline(leaf, text);
}

export function listSeparator(branch: Branch, text?: string): Result<Branch> {
  return branch.expectListSeparator(leaf, text);
}

/**
 * Statement or expression. Stands in for the expression grammar, which does
 * not exist yet: any run of word characters is accepted.
 */
export function operation(branch: Branch, text: string): Result<Branch> {
  return branch.expectOperation(text, leaf);
}
