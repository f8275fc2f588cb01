import type { Coordinate2D } from '../types';

/**
 * Uniform grid over point entries, built for a single scan and then dropped.
 *
 * Cell size must be at least twice the largest query radius so that every
 * point within that radius sits in the 3x3 block of cells around the query.
 */
export class EndpointGrid<T> {
  private cells = new Map<string, Array<{ point: Coordinate2D; value: T }>>();

  constructor(private readonly cellSize: number) {
    if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
      throw new RangeError(`EndpointGrid cell size must be a positive finite number, got ${cellSize}`);
    }
  }

  private cellOf(point: Readonly<Coordinate2D>): [number, number] {
    return [Math.floor(point[0] / this.cellSize), Math.floor(point[1] / this.cellSize)];
  }

  insert(point: Coordinate2D, value: T): void {
    const [cx, cy] = this.cellOf(point);
    const key = `${cx}:${cy}`;
    const bucket = this.cells.get(key);
    if (bucket) {
      bucket.push({ point, value });
    } else {
      this.cells.set(key, [{ point, value }]);
    }
  }

  /**
   * Entries in the 3x3 neighbourhood of the query point's cell
   */
  *neighbours(point: Readonly<Coordinate2D>): IterableIterator<{ point: Coordinate2D; value: T }> {
    const [cx, cy] = this.cellOf(point);
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        const bucket = this.cells.get(`${cx + dx}:${cy + dy}`);
        if (bucket) {
          yield* bucket;
        }
      }
    }
  }

  get size(): number {
    let total = 0;
    for (const bucket of this.cells.values()) {
      total += bucket.length;
    }
    return total;
  }
}
