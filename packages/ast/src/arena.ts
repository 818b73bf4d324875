import type { AstNode, NodeKind, Position } from "@helena/syntax";
import type { PatternTable } from "./patterns";

/** Index of a node in the arena that owns it. */
export type NodeId = number;

export type NodeRecord = {
  readonly kind: NodeKind;
  readonly text: string;
  readonly column: number;
  readonly row: number;
  readonly continuations: Array<NodeId | null>;
};

/**
 * Storage of the nodes of trees under construction. Successors are referred
 * to by index. Nodes are only ever discarded from the end, which is where a
 * failed candidate and everything built after it lie.
 */
export class NodeArena {
  private readonly records: NodeRecord[] = [];

  constructor(public readonly patterns: PatternTable) {}

  get size(): number {
    return this.records.length;
  }

  allocate(kind: NodeKind, text: string, position: Position): NodeId {
    this.records.push({
      kind,
      text,
      column: position.column,
      row: position.row,
      continuations: [],
    });
    return this.records.length - 1;
  }

  get(id: NodeId): NodeRecord {
    const record = this.records[id];
    if (!record) {
      throw new RangeError(`No node at index ${id} (arena holds ${this.size})`);
    }
    return record;
  }

  /** Discards every node allocated at or after `size`. */
  rewind(size: number): void {
    this.records.length = Math.min(this.records.length, size);
  }

  /** Copies the subtree rooted at `id` out of the arena as frozen nodes. */
  materialize(id: NodeId): AstNode {
    const record = this.get(id);
    const continuations = record.continuations.map((next) =>
      next === null ? null : this.materialize(next)
    );
    return Object.freeze({
      kind: record.kind,
      text: record.text,
      column: record.column,
      row: record.row,
      continuations: Object.freeze(continuations),
    });
  }
}
