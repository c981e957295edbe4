/**
 * Commands: reversible edits to a Grid.
 *
 * Every command records what it overwrote when first applied (never at
 * construction) and toggles between applied and unapplied. Calling apply
 * or undo while already in that state does nothing.
 */

import type { Cell } from "./cell.js";
import { EMPTY_CELL } from "./cell.js";
import type { DrawOp } from "./draw-op.js";
import type { Grid } from "./grid.js";

/** Largest op count a merged DrawBatch may reach (exclusive). */
export const MERGE_CAP = 1000;

export type Command = SetCell | ClearCell | ClearGrid | DrawBatch | Composite;
export type CommandKind = Command["kind"];

interface Reversible {
  readonly description: string;
  readonly applied: boolean;
  apply(grid: Grid): void;
  undo(grid: Grid): void;
}

// ─── Single cell ────────────────────────────────────────────────────────────

export class SetCell implements Reversible {
  readonly kind = "set-cell";
  readonly description: string = "Set cell";
  private prior: Cell | undefined;
  private _applied = false;

  constructor(
    readonly x: number,
    readonly y: number,
    readonly cell: Cell,
  ) {}

  get applied(): boolean {
    return this._applied;
  }

  apply(grid: Grid): void {
    if (this._applied) return;
    this.prior = grid.get(this.x, this.y);
    grid.set(this.x, this.y, this.cell);
    this._applied = true;
  }

  undo(grid: Grid): void {
    if (!this._applied) return;
    if (this.prior) grid.set(this.x, this.y, this.prior);
    this._applied = false;
  }
}

export class ClearCell implements Reversible {
  readonly kind = "clear-cell";
  readonly description: string = "Clear cell";
  private prior: Cell | undefined;
  private _applied = false;

  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  get applied(): boolean {
    return this._applied;
  }

  apply(grid: Grid): void {
    if (this._applied) return;
    this.prior = grid.get(this.x, this.y);
    grid.set(this.x, this.y, EMPTY_CELL);
    this._applied = true;
  }

  undo(grid: Grid): void {
    if (!this._applied) return;
    if (this.prior) grid.set(this.x, this.y, this.prior);
    this._applied = false;
  }
}

// ─── Whole grid ─────────────────────────────────────────────────────────────

/**
 * Blank the whole grid. Undo restores the snapshot only while the grid
 * still has the snapshot's dimensions; after a resize it leaves the
 * command applied.
 */
export class ClearGrid implements Reversible {
  readonly kind = "clear-grid";
  readonly description: string = "Clear canvas";
  private snapshot: { cells: Cell[]; width: number; height: number } | null = null;
  private _applied = false;

  get applied(): boolean {
    return this._applied;
  }

  apply(grid: Grid): void {
    if (this._applied) return;
    this.snapshot = { cells: grid.snapshot(), width: grid.width, height: grid.height };
    grid.clear();
    this._applied = true;
  }

  undo(grid: Grid): void {
    if (!this._applied || !this.snapshot) return;
    const { cells, width, height } = this.snapshot;
    if (grid.width !== width || grid.height !== height) return;
    grid.restore(cells, width, height);
    this._applied = false;
  }
}

// ─── Batches ────────────────────────────────────────────────────────────────

function batchDescription(count: number): string {
  return count === 1 ? "Draw" : `Draw ${count} cells`;
}

/**
 * An ordered list of DrawOps applied as one edit. Undo restores prior
 * cells in reverse, so ops that hit the same cell twice unwind correctly.
 */
export class DrawBatch implements Reversible {
  readonly kind = "draw";
  private _ops: DrawOp[];
  private _description: string;
  private readonly fixedDescription: boolean;
  private prior: (Cell | undefined)[] = [];
  private _applied = false;

  constructor(ops: readonly DrawOp[], description?: string) {
    this._ops = [...ops];
    this.fixedDescription = description !== undefined;
    this._description = description ?? batchDescription(this._ops.length);
  }

  get ops(): readonly DrawOp[] {
    return this._ops;
  }

  get description(): string {
    return this._description;
  }

  get applied(): boolean {
    return this._applied;
  }

  get isEmpty(): boolean {
    return this._ops.length === 0;
  }

  apply(grid: Grid): void {
    if (this._applied) return;
    this.prior = [];
    for (const op of this._ops) {
      this.prior.push(grid.get(op.x, op.y));
      grid.set(op.x, op.y, op.cell);
    }
    this._applied = true;
  }

  undo(grid: Grid): void {
    if (!this._applied) return;
    for (let i = this._ops.length - 1; i >= 0; i--) {
      const cell = this.prior[i];
      if (cell) grid.set(this._ops[i].x, this._ops[i].y, cell);
    }
    this.prior = [];
    this._applied = false;
  }

  /** Only an unapplied batch absorbs another batch, and only below MERGE_CAP ops. */
  canMerge(other: Command): boolean {
    return (
      other.kind === "draw" &&
      !this._applied &&
      this._ops.length + other.ops.length < MERGE_CAP
    );
  }

  /** Append another batch's ops. Returns false (and changes nothing) when not mergeable. */
  merge(other: Command): boolean {
    if (other.kind !== "draw" || !this.canMerge(other)) return false;
    this._ops = this._ops.concat(other.ops);
    if (!this.fixedDescription) this._description = batchDescription(this._ops.length);
    return true;
  }
}

/** Children applied in order and undone in reverse, as one unit. */
export class Composite implements Reversible {
  readonly kind = "composite";
  private readonly children: Command[];
  private _applied = false;

  constructor(
    children: readonly Command[],
    readonly description: string,
  ) {
    this.children = [...children];
  }

  get size(): number {
    return this.children.length;
  }

  get applied(): boolean {
    return this._applied;
  }

  apply(grid: Grid): void {
    if (this._applied) return;
    for (const child of this.children) child.apply(grid);
    this._applied = true;
  }

  undo(grid: Grid): void {
    if (!this._applied) return;
    for (let i = this.children.length - 1; i >= 0; i--) this.children[i].undo(grid);
    this._applied = false;
  }
}
