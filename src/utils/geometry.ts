import type { BoundingBox, Coordinate2D } from '../types';

// Planar geometry helpers. All distances are Euclidean in source coordinate units.

export function pointDistance(a: Readonly<Coordinate2D>, b: Readonly<Coordinate2D>): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

/**
 * Distance from a point to the segment [start, end]
 */
export function pointToSegmentDistance(
  point: Readonly<Coordinate2D>,
  start: Readonly<Coordinate2D>,
  end: Readonly<Coordinate2D>
): number {
  const A = point[0] - start[0];
  const B = point[1] - start[1];
  const C = end[0] - start[0];
  const D = end[1] - start[1];

  const lenSq = C * C + D * D;
  if (lenSq === 0) {
    // Degenerate segment
    return pointDistance(point, start);
  }

  const param = (A * C + B * D) / lenSq;

  let xx: number;
  let yy: number;
  if (param < 0) {
    xx = start[0];
    yy = start[1];
  } else if (param > 1) {
    xx = end[0];
    yy = end[1];
  } else {
    xx = start[0] + param * C;
    yy = start[1] + param * D;
  }

  return Math.hypot(point[0] - xx, point[1] - yy);
}

/**
 * Distance from a point to the nearest point anywhere along a polyline
 */
export function pointToLineDistance(point: Readonly<Coordinate2D>, line: readonly Coordinate2D[]): number {
  if (line.length === 0) {
    return Infinity;
  }
  if (line.length === 1) {
    return pointDistance(point, line[0]);
  }

  let min = Infinity;
  for (let k = 1; k < line.length; k++) {
    const d = pointToSegmentDistance(point, line[k - 1], line[k]);
    if (d < min) {
      min = d;
      if (min === 0) break;
    }
  }
  return min;
}

export function lineBoundingBox(line: readonly Coordinate2D[]): BoundingBox {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const [x, y] of line) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return { minX, maxX, minY, maxY };
}

/**
 * Lower bound on the distance from a point to anything inside the box
 */
export function pointToBoxDistance(point: Readonly<Coordinate2D>, box: BoundingBox): number {
  const dx = Math.max(box.minX - point[0], 0, point[0] - box.maxX);
  const dy = Math.max(box.minY - point[1], 0, point[1] - box.maxY);
  return Math.hypot(dx, dy);
}

export function firstPoint(line: readonly Coordinate2D[]): Coordinate2D {
  return line[0];
}

export function lastPoint(line: readonly Coordinate2D[]): Coordinate2D {
  return line[line.length - 1];
}
