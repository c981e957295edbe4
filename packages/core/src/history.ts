/**
 * History: bounded undo/redo stacks of commands.
 *
 * Commands are pushed after they have been applied. Pushing clears the
 * redo stack; past capacity the oldest entry is dropped.
 *
 * Evicted undo entries stay below `undoBase` until the array is compacted,
 * once per `capacity` evictions.
 */

import type { Command } from "./commands.js";
import type { Grid } from "./grid.js";

export const DEFAULT_HISTORY_CAPACITY = 100;

export class History {
  private undoStack: Command[] = [];
  private undoBase = 0;
  private redoStack: Command[] = [];
  readonly capacity: number;

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    this.capacity = Math.max(1, Math.trunc(capacity));
  }

  push(command: Command): void {
    this.redoStack = [];
    if (this.undoCount >= this.capacity) this.evictOldest();
    this.undoStack.push(command);
  }

  private evictOldest(): void {
    this.undoBase += 1;
    if (this.undoBase >= this.capacity) {
      this.undoStack = this.undoStack.slice(this.undoBase);
      this.undoBase = 0;
    }
  }

  /** Apply a command to the grid and record it. */
  execute(command: Command, grid: Grid): void {
    command.apply(grid);
    this.push(command);
  }

  undo(grid: Grid): boolean {
    if (this.undoCount === 0) return false;
    const command = this.undoStack.pop();
    if (!command) return false;
    command.undo(grid);
    this.redoStack.push(command);
    return true;
  }

  redo(grid: Grid): boolean {
    const command = this.redoStack.pop();
    if (!command) return false;
    command.apply(grid);
    this.undoStack.push(command);
    return true;
  }

  get canUndo(): boolean {
    return this.undoCount > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoCount(): number {
    return this.undoStack.length - this.undoBase;
  }

  get redoCount(): number {
    return this.redoStack.length;
  }

  /** Description of the command `undo` would revert. */
  get undoDescription(): string | undefined {
    return this.canUndo ? this.undoStack.at(-1)?.description : undefined;
  }

  get redoDescription(): string | undefined {
    return this.redoStack.at(-1)?.description;
  }

  clear(): void {
    this.undoStack = [];
    this.undoBase = 0;
    this.redoStack = [];
  }
}
