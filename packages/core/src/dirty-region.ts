/**
 * Track the region of the canvas that changed since the last render pull,
 * so the host can repaint a rectangle instead of the whole grid.
 */

/** Inclusive rectangle of cells. Empty when x1 > x2 or y1 > y2. */
export class DirtyRect {
  constructor(
    public x1: number,
    public y1: number,
    public x2: number,
    public y2: number,
  ) {}

  static empty(): DirtyRect {
    return new DirtyRect(Infinity, Infinity, -Infinity, -Infinity);
  }

  static single(x: number, y: number): DirtyRect {
    return new DirtyRect(x, y, x, y);
  }

  static fromPoints(x1: number, y1: number, x2: number, y2: number): DirtyRect {
    return new DirtyRect(Math.min(x1, x2), Math.min(y1, y2), Math.max(x1, x2), Math.max(y1, y2));
  }

  /** The whole grid. */
  static full(width: number, height: number): DirtyRect {
    return new DirtyRect(0, 0, Math.max(0, width - 1), Math.max(0, height - 1));
  }

  get isEmpty(): boolean {
    return this.x1 > this.x2 || this.y1 > this.y2;
  }

  isFull(width: number, height: number): boolean {
    return this.x1 === 0 && this.y1 === 0 && this.x2 === width - 1 && this.y2 === height - 1;
  }

  get width(): number {
    return this.isEmpty ? 0 : this.x2 - this.x1 + 1;
  }

  get height(): number {
    return this.isEmpty ? 0 : this.y2 - this.y1 + 1;
  }

  get area(): number {
    return this.width * this.height;
  }

  /** Grow to include a point. */
  include(x: number, y: number): void {
    this.x1 = Math.min(this.x1, x);
    this.y1 = Math.min(this.y1, y);
    this.x2 = Math.max(this.x2, x);
    this.y2 = Math.max(this.y2, y);
  }

  /** Grow to include another rect. An empty operand changes nothing. */
  union(other: DirtyRect): void {
    if (other.isEmpty) return;
    if (this.isEmpty) {
      this.x1 = other.x1;
      this.y1 = other.y1;
      this.x2 = other.x2;
      this.y2 = other.y2;
      return;
    }
    this.x1 = Math.min(this.x1, other.x1);
    this.y1 = Math.min(this.y1, other.y1);
    this.x2 = Math.max(this.x2, other.x2);
    this.y2 = Math.max(this.y2, other.y2);
  }

  /** Clamp to grid bounds. Leaves an empty rect empty. */
  clamp(width: number, height: number): void {
    if (this.isEmpty) return;
    this.x1 = Math.min(Math.max(this.x1, 0), width - 1);
    this.y1 = Math.min(Math.max(this.y1, 0), height - 1);
    this.x2 = Math.min(Math.max(this.x2, 0), width - 1);
    this.y2 = Math.min(Math.max(this.y2, 0), height - 1);
  }

  contains(x: number, y: number): boolean {
    return x >= this.x1 && x <= this.x2 && y >= this.y1 && y <= this.y2;
  }

  clone(): DirtyRect {
    return new DirtyRect(this.x1, this.y1, this.x2, this.y2);
  }

  /** Every cell in the rect, row by row. */
  *cells(): IterableIterator<{ x: number; y: number }> {
    if (this.isEmpty) return;
    for (let y = this.y1; y <= this.y2; y++) {
      for (let x = this.x1; x <= this.x2; x++) {
        yield { x, y };
      }
    }
  }
}

/** What the host must repaint. */
export type DirtyState =
  | { full: true }
  | { full: false; rect: DirtyRect };

export class DirtyTracker {
  private _rect = DirtyRect.empty();
  private _fullRedraw = false;

  /** Mark a single cell as dirty. */
  mark(x: number, y: number): void {
    this._rect.include(x, y);
  }

  /** Mark the rectangle between two corners as dirty. */
  markRegion(x1: number, y1: number, x2: number, y2: number): void {
    this._rect.union(DirtyRect.fromPoints(x1, y1, x2, y2));
  }

  /** Request a full redraw. Stays requested until clear(). */
  requestFull(): void {
    this._fullRedraw = true;
  }

  get rect(): DirtyRect {
    return this._rect;
  }

  /**
   * Whether the host should repaint everything. An empty rect without an
   * explicit request also counts: the initial, never-rendered state.
   */
  get needsFullRedraw(): boolean {
    return this._fullRedraw || this._rect.isEmpty;
  }

  /** Whether anything at all was marked or requested since the last clear. */
  get hasChanges(): boolean {
    return this._fullRedraw || !this._rect.isEmpty;
  }

  clear(): void {
    this._rect = DirtyRect.empty();
    this._fullRedraw = false;
  }

  /** Get the current dirty state and clear it. */
  flush(): DirtyState {
    const state: DirtyState = this.needsFullRedraw
      ? { full: true }
      : { full: false, rect: this._rect.clone() };
    this.clear();
    return state;
  }
}
