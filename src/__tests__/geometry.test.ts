import {
  lineBoundingBox,
  pointDistance,
  pointToBoxDistance,
  pointToLineDistance,
  pointToSegmentDistance
} from '../utils/geometry';
import { EndpointGrid } from '../utils/spatial-index';

describe('planar geometry', () => {
  it('measures point distances', () => {
    expect(pointDistance([0, 0], [3, 4])).toBe(5);
  });

  it('projects onto the interior of a segment', () => {
    expect(pointToSegmentDistance([5, 3], [0, 0], [10, 0])).toBe(3);
  });

  it('clamps to the nearest segment end', () => {
    expect(pointToSegmentDistance([13, 4], [0, 0], [10, 0])).toBe(5);
    expect(pointToSegmentDistance([-3, -4], [0, 0], [10, 0])).toBe(5);
  });

  it('handles degenerate segments', () => {
    expect(pointToSegmentDistance([3, 4], [0, 0], [0, 0])).toBe(5);
  });

  it('takes the closest segment of a polyline', () => {
    const line: [number, number][] = [[0, 0], [10, 0], [10, 10]];

    expect(pointToLineDistance([12, 5], line)).toBe(2);
    expect(pointToLineDistance([5, 1], line)).toBe(1);
    expect(pointToLineDistance([10, 0], line)).toBe(0);
  });

  it('falls back for short polylines', () => {
    expect(pointToLineDistance([0, 0], [])).toBe(Infinity);
    expect(pointToLineDistance([0, 0], [[3, 4]])).toBe(5);
  });

  it('computes bounding boxes and distances to them', () => {
    const box = lineBoundingBox([[2, 1], [-1, 4], [0, 0]]);

    expect(box).toEqual({ minX: -1, maxX: 2, minY: 0, maxY: 4 });
    expect(pointToBoxDistance([0, 2], box)).toBe(0);
    expect(pointToBoxDistance([5, 8], box)).toBe(5);
    expect(pointToBoxDistance([-4, 2], box)).toBe(3);
  });
});

describe('EndpointGrid', () => {
  it('finds entries in neighbouring cells only', () => {
    const grid = new EndpointGrid<string>(1);
    grid.insert([0.5, 0.5], 'a');
    grid.insert([1.2, 0.1], 'b');
    grid.insert([5, 5], 'c');

    const near = [...grid.neighbours([0.9, 0.9])].map(entry => entry.value).sort();

    expect(near).toEqual(['a', 'b']);
    expect(grid.size).toBe(3);
  });

  it('handles negative coordinates', () => {
    const grid = new EndpointGrid<number>(0.5);
    grid.insert([-0.1, -0.1], 1);

    expect([...grid.neighbours([0.1, 0.1])].map(entry => entry.value)).toEqual([1]);
  });

  it('rejects a non-positive cell size', () => {
    expect(() => new EndpointGrid<number>(0)).toThrow(RangeError);
  });
});
