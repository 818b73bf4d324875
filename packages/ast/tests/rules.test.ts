import { describe, expect, test } from "vitest";
import { NodeKind } from "@helena/syntax";
import {
  Branch,
  PatternTable,
  identifier,
  listSeparator,
  newline,
  operation,
  spacing,
  typeIdentifier,
} from "../src/index.ts";

describe("single-token rules", () => {
  test("each builds one node that ends the production", () => {
    const cases = [
      [NodeKind.Identifier, (root: Branch) => identifier(root, "main")],
      [NodeKind.TypeIdentifier, (root: Branch) => typeIdentifier(root, "int[]")],
      [NodeKind.Spacing, (root: Branch) => spacing(root)],
      [NodeKind.Newline, (root: Branch) => newline(root)],
      [NodeKind.ListSeparator, (root: Branch) => listSeparator(root)],
      [NodeKind.Operation, (root: Branch) => operation(root, "print")],
    ] as const;

    for (const [kind, rule] of cases) {
      const root = Branch.root({ patterns: new PatternTable("\n") });
      expect(rule(root).ok).toBe(true);

      const [token] = root.successors();
      expect(token?.kind).toBe(kind);
      expect(token?.continuations).toEqual([null]);
    }
  });

  test("take the text found in the source", () => {
    const root = Branch.root({ patterns: new PatternTable("\n") });

    expect(spacing(root, "\t").ok).toBe(false);
    expect(listSeparator(root, ",").ok).toBe(false);
    expect(newline(root, "\r\n").ok).toBe(false);
    expect(root.continuations).toEqual([]);

    expect(newline(root, "\n").ok).toBe(true);
    expect(root.successors()[0]?.text).toBe("\n");
  });

  test("reject invalid identifiers and operations", () => {
    const root = Branch.root();

    const result = identifier(root, "");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Expected an identifier.");
    }
    expect(operation(root, "a+b").ok).toBe(false);
    expect(root.continuations).toEqual([]);
  });
});
