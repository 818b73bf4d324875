import {
  LIST_SEPARATOR,
  NodeKind,
  SPACE,
  START_POSITION,
  type AstNode,
  type Keyword,
  type Position,
} from "@helena/syntax";
import { NodeArena, type NodeId } from "./arena";
import { PatternMismatchError } from "./errors";
import { PatternTable } from "./patterns";
import { nextPosition } from "./position";
import { labelOf } from "./render";
import { fail, ok, type Result } from "./result";

/**
 * Describes everything that may follow a candidate node, by issuing further
 * `expect` and `leaf` calls on it.
 */
export type Continuation = (branch: Branch) => Result<Branch>;

export interface RootOptions {
  patterns?: PatternTable;
  position?: Position;
}

/**
 * Handle on a node under construction.
 *
 * Rules are written as nested `expect` calls that mirror the right-hand side
 * of a production from left to right, ended by `leaf`. There is no
 * backtracking: a rule enumerates its alternatives itself, inside the
 * continuation of the node they branch from.
 */
export class Branch {
  private constructor(
    private readonly arena: NodeArena,
    public readonly id: NodeId
  ) {}

  /** Starts a new tree with an anchor node at `position`. */
  static root(options: RootOptions = {}): Branch {
    const arena = new NodeArena(options.patterns ?? new PatternTable());
    const id = arena.allocate(
      NodeKind.Anchor,
      "",
      options.position ?? START_POSITION
    );
    return new Branch(arena, id);
  }

  get kind(): NodeKind {
    return this.arena.get(this.id).kind;
  }

  get text(): string {
    return this.arena.get(this.id).text;
  }

  get position(): Position {
    const { column, row } = this.arena.get(this.id);
    return { column, row };
  }

  get continuations(): ReadonlyArray<NodeId | null> {
    return this.arena.get(this.id).continuations;
  }

  get patterns(): PatternTable {
    return this.arena.patterns;
  }

  /** Marks that the production may end at this node. */
  leaf(): Result<Branch> {
    const { continuations } = this.arena.get(this.id);
    if (!continuations.includes(null)) {
      continuations.push(null);
    }
    return ok(this);
  }

  /**
   * Proposes a node of `kind` with `text` as the next one, positioned after
   * its own text. The candidate is attached only if its text matches and
   * `continuation` succeeds on it; otherwise this node is left exactly as it
   * was. A candidate the continuation leaves bare may still be ended or
   * extended afterwards.
   *
   * @param expected - literal the text must equal, for keywords
   */
  expect(
    kind: NodeKind,
    text: string,
    continuation: Continuation,
    expected?: string
  ): Result<Branch> {
    const current = this.arena.get(this.id);
    const position = nextPosition(current, text);

    const validation = this.arena.patterns.validate(
      kind,
      text,
      position,
      expected
    );
    if (!validation.ok) {
      return validation;
    }

    const mark = this.arena.size;
    const candidate = new Branch(
      this.arena,
      this.arena.allocate(kind, text, position)
    );

    const extended = continuation(candidate);
    if (!extended.ok) {
      this.arena.rewind(mark);
      return extended;
    }

    current.continuations.push(candidate.id);
    return ok(this);
  }

  /**
   * @param text - what the source holds where `keyword` is required, when it
   * is not taken for granted
   */
  expectKeyword(
    keyword: Keyword,
    continuation: Continuation,
    text: string = keyword
  ): Result<Branch> {
    return this.expect(NodeKind.Keyword, text, continuation, keyword);
  }

  expectSpace(continuation: Continuation, text: string = SPACE): Result<Branch> {
    return this.expect(NodeKind.Spacing, text, continuation);
  }

  expectIdentifier(text: string, continuation: Continuation): Result<Branch> {
    return this.expect(NodeKind.Identifier, text, continuation);
  }

  expectTypeIdentifier(
    text: string,
    continuation: Continuation
  ): Result<Branch> {
    return this.expect(NodeKind.TypeIdentifier, text, continuation);
  }

  expectNewline(
    continuation: Continuation,
    text: string = this.arena.patterns.newline
  ): Result<Branch> {
    return this.expect(NodeKind.Newline, text, continuation);
  }

  expectListSeparator(
    continuation: Continuation,
    text: string = LIST_SEPARATOR
  ): Result<Branch> {
    return this.expect(NodeKind.ListSeparator, text, continuation);
  }

  expectOperation(text: string, continuation: Continuation): Result<Branch> {
    return this.expect(NodeKind.Operation, text, continuation);
  }

  /** Successors attached so far, in order. */
  successors(): Branch[] {
    return this.continuations
      .filter((next): next is NodeId => next !== null)
      .map((next) => new Branch(this.arena, next));
  }

  /**
   * First node reachable from this one, depth first, that neither ends the
   * production nor has a successor.
   */
  findUnterminated(): Branch | undefined {
    if (this.continuations.length === 0) {
      return this;
    }
    for (const next of this.successors()) {
      const found = next.findUnterminated();
      if (found) return found;
    }
    return undefined;
  }

  /** Fails when some node reachable from this one cannot end the production. */
  checkTermination(): Result<Branch> {
    const bare = this.findUnterminated();
    if (!bare) {
      return ok(this);
    }
    return fail(
      new PatternMismatchError(
        `Production cannot end at ${labelOf(bare.kind, bare.text)}.`,
        bare.kind,
        bare.text,
        bare.position
      )
    );
  }

  toNode(): AstNode {
    return this.arena.materialize(this.id);
  }
}

/** Continuation that ends the production at the node it is given. */
export const leaf: Continuation = (branch) => branch.leaf();
