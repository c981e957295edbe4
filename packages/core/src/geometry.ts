/**
 * Integer geometry helpers for the tools.
 */

export interface Point {
  x: number;
  y: number;
}

/** Clamp a coordinate to [0, width-1] × [0, height-1]. */
export function clampToGrid(x: number, y: number, width: number, height: number): Point {
  return {
    x: Math.min(Math.max(Math.trunc(x), 0), Math.max(width - 1, 0)),
    y: Math.min(Math.max(Math.trunc(y), 0), Math.max(height - 1, 0)),
  };
}

/** Unit step from a toward b: 1 when a < b, otherwise -1. */
export function stepToward(a: number, b: number): 1 | -1 {
  return a < b ? 1 : -1;
}

/**
 * Cells on the straight segment from (x1, y1) to (x2, y2), both ends
 * included, using Bresenham's error accumulator. The segment is always
 * rasterized from its leftmost (then topmost) end, so both directions
 * visit the same cells; the result is ordered from (x1, y1).
 */
export function bresenham(x1: number, y1: number, x2: number, y2: number): Point[] {
  if (x1 > x2 || (x1 === x2 && y1 > y2)) {
    return rasterize(x2, y2, x1, y1).reverse();
  }
  return rasterize(x1, y1, x2, y2);
}

function rasterize(x1: number, y1: number, x2: number, y2: number): Point[] {
  const points: Point[] = [];
  const dx = Math.abs(x2 - x1);
  const dy = Math.abs(y2 - y1);
  const sx = stepToward(x1, x2);
  const sy = stepToward(y1, y2);
  let err = dx - dy;
  let x = x1;
  let y = y1;

  for (;;) {
    points.push({ x, y });
    if (x === x2 && y === y2) break;
    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
  return points;
}
