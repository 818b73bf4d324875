import { describe, expect, test } from "vitest";
import { NodeKind, type AstNode } from "@helena/syntax";
import {
  Branch,
  functionDeclaration,
  labelOf,
  leaf,
  renderTree,
} from "../src/index.ts";

function node(
  kind: NodeKind,
  text: string,
  continuations: Array<AstNode | null>
): AstNode {
  return { kind, text, column: 1, row: 0, continuations };
}

describe("renderTree", () => {
  test("renders one line per node, indented by depth", () => {
    const root = Branch.root();
    functionDeclaration(root, { name: "main", parameters: [] });
    const [declaration] = root.successors();
    if (!declaration) throw new Error("Missing declaration");

    expect(renderTree(declaration.toNode())).toBe(
      [
        '├─ Keyword "func"',
        "   ├─ Spacing",
        '      ├─ Identifier "main"',
        '         ├─ Keyword "("',
        '            ├─ Keyword ")"',
        '               ├─ Keyword ":"',
      ].join("\n")
    );
  });

  test("renders the anchor of a production above it", () => {
    const root = Branch.root();
    root.expectKeyword("func", leaf);

    expect(renderTree(root.toNode())).toBe(
      ["├─ Anchor", '   ├─ Keyword "func"'].join("\n")
    );
  });

  test("labels separators with their text", () => {
    const tree = node(NodeKind.Identifier, "a", [
      node(NodeKind.ListSeparator, ", ", [null]),
    ]);

    expect(renderTree(tree, { indentWidth: 2 })).toBe(
      ['├─ Identifier "a"', '  ├─ ListSeparator ", "'].join("\n")
    );
  });

  test("stops at an end marker, hiding later siblings", () => {
    const tree = node(NodeKind.Keyword, ")", [
      node(NodeKind.Keyword, ":", [null]),
      null,
      node(NodeKind.Newline, "\n", [null]),
    ]);

    expect(renderTree(tree)).toBe(
      ['├─ Keyword ")"', '   ├─ Keyword ":"'].join("\n")
    );
  });

  test("starts at the given depth", () => {
    const tree = node(NodeKind.Newline, "\n", [null]);
    expect(renderTree(tree, { depth: 2 })).toBe("      ├─ Newline");
  });
});

describe("labelOf", () => {
  test("uses the bare kind when the text adds nothing", () => {
    expect(labelOf("func", "func")).toBe("func");
    expect(labelOf(NodeKind.Newline, "\r\n")).toBe("Newline");
    expect(labelOf(NodeKind.Anchor, "")).toBe("Anchor");
  });

  test("quotes the text otherwise", () => {
    expect(labelOf(NodeKind.Identifier, "main")).toBe('Identifier "main"');
  });
});
