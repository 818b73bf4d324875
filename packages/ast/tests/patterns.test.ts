import { EOL } from "node:os";
import { describe, expect, test } from "vitest";
import { NodeKind } from "@helena/syntax";
import {
  PatternTable,
  resolveNewline,
  validateIdentifier,
  type Result,
} from "../src/index.ts";

const table = new PatternTable("\n");

function messageOf(result: Result<string>): string {
  if (result.ok) {
    throw new Error(`Expected a mismatch, got ${JSON.stringify(result.value)}`);
  }
  return result.error.message;
}

describe("validateIdentifier", () => {
  test("rejects empty text", () => {
    const result = validateIdentifier("");
    expect(result.ok).toBe(false);
    expect(messageOf(result)).toBe("Expected an identifier.");
  });

  test("accepts letters and digits", () => {
    expect(validateIdentifier("main")).toEqual({ ok: true, value: "main" });
    expect(validateIdentifier("h06")).toEqual({ ok: true, value: "h06" });
  });

  test("rejects other characters", () => {
    expect(messageOf(validateIdentifier("ma-in"))).toBe(
      "ma-in is invalid. An identifier can only contain letters A–Z and digits."
    );
    expect(validateIdentifier("snake_case").ok).toBe(false);
  });
});

describe("PatternTable", () => {
  test("accepts array and underscored type names", () => {
    expect(table.validate(NodeKind.TypeIdentifier, "string[]").ok).toBe(true);
    expect(table.validate(NodeKind.TypeIdentifier, "big_int[][]").ok).toBe(
      true
    );
    expect(messageOf(table.validate(NodeKind.TypeIdentifier, ""))).toBe(
      "Expected an identifier."
    );
  });

  test("matches spacing and list separators exactly", () => {
    expect(table.validate(NodeKind.Spacing, " ").ok).toBe(true);
    expect(messageOf(table.validate(NodeKind.Spacing, "  "))).toBe(
      'Textual representation of node ("  ") does not match " ".'
    );
    expect(table.validate(NodeKind.ListSeparator, ", ").ok).toBe(true);
    expect(messageOf(table.validate(NodeKind.ListSeparator, ","))).toBe(
      'Textual representation of node (",") does not match ", ".'
    );
  });

  test("matches the line terminator chosen for the build", () => {
    expect(table.validate(NodeKind.Newline, "\n").ok).toBe(true);
    expect(messageOf(table.validate(NodeKind.Newline, "\r\n"))).toBe(
      'Textual representation of node ("\\r\\n") does not match "\\n".'
    );
    const crlf = new PatternTable("\r\n");
    expect(crlf.validate(NodeKind.Newline, "\r\n").ok).toBe(true);
    expect(crlf.validate(NodeKind.Newline, "\n").ok).toBe(false);
  });

  test("compares keywords with the expected literal", () => {
    expect(table.validate(NodeKind.Keyword, "(", undefined, "(").ok).toBe(
      true
    );
    expect(
      messageOf(table.validate(NodeKind.Keyword, "[", undefined, "("))
    ).toBe('Textual representation of node ("[") does not match "(".');
  });

  test("falls back to the keyword table without an expected literal", () => {
    expect(table.validate(NodeKind.Keyword, "func").ok).toBe(true);
    expect(messageOf(table.validate(NodeKind.Keyword, "fn"))).toBe(
      'Textual representation of node ("fn") does not match any keyword.'
    );
  });

  test("accepts word characters as operations", () => {
    expect(table.validate(NodeKind.Operation, "print_all").ok).toBe(true);
    expect(messageOf(table.validate(NodeKind.Operation, "a b"))).toBe(
      'Textual representation of node ("a b") does not match /^\\w+$/.'
    );
  });

  test("only accepts empty anchors", () => {
    expect(table.validate(NodeKind.Anchor, "").ok).toBe(true);
    expect(table.validate(NodeKind.Anchor, "x").ok).toBe(false);
  });

  test("reports the position and kind of the mismatch", () => {
    const result = table.validate(NodeKind.Identifier, "", {
      column: 4,
      row: 17,
    });
    if (result.ok) throw new Error("Expected a mismatch");
    expect(result.error.kind).toBe(NodeKind.Identifier);
    expect(result.error.text).toBe("");
    expect(result.error.position).toEqual({ column: 4, row: 17 });
  });
});

describe("resolveNewline", () => {
  test("maps styles to terminators", () => {
    expect(resolveNewline("lf")).toBe("\n");
    expect(resolveNewline("crlf")).toBe("\r\n");
    expect(resolveNewline()).toBe(EOL === "\r\n" ? "\r\n" : "\n");
  });
});
