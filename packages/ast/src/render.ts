import type { AstNode } from "@helena/syntax";

export interface RenderOptions {
  /** Spaces per level of depth (default: 3) */
  indentWidth?: number;
  /** Depth of the root (default: 0) */
  depth?: number;
}

const BRANCH_MARKER = "├─ ";

/**
 * Renders a tree as indented ASCII art, one line per node. Meant for people:
 * the layout carries no compatibility guarantee.
 */
export function renderTree(root: AstNode, options: RenderOptions = {}): string {
  const indentWidth = options.indentWidth ?? 3;
  const lines: string[] = [];
  renderNode(root, options.depth ?? 0, indentWidth, lines);
  return lines.join("\n");
}

function renderNode(
  node: AstNode,
  depth: number,
  indentWidth: number,
  lines: string[]
): void {
  lines.push(
    `${" ".repeat(indentWidth * depth)}${BRANCH_MARKER}${labelOf(
      node.kind,
      node.text
    )}`
  );
  for (const next of node.continuations) {
    // An end marker closes the list: later siblings are not shown.
    if (next === null) return;
    renderNode(next, depth + 1, indentWidth, lines);
  }
}

/**
 * Bare kind when the text adds nothing to it, kind and quoted text otherwise.
 */
export function labelOf(kind: string, text: string): string {
  if (kind === text || text.trim() === "") {
    return kind;
  }
  return `${kind} "${text}"`;
}
