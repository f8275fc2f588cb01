import { GROUP_ISSUE_STYLE } from '../constants';
import { configHelpers } from '../config/lane-integrity.global.config';
import type {
  BoundingBox,
  Coordinate2D,
  EndpointPosition,
  GapDetectionOptions,
  GapThresholds,
  GroupLabel,
  LaneClass,
  LaneFeature,
  LaneIssue
} from '../types';
import { MalformedGeometryError } from '../utils/errors';
import {
  firstPoint,
  lastPoint,
  lineBoundingBox,
  pointDistance,
  pointToBoxDistance,
  pointToLineDistance
} from '../utils/geometry';
import { EndpointGrid } from '../utils/spatial-index';

/**
 * Lines of these classes may legitimately continue into each other.
 * 'other' never matches, not even itself.
 */
export function areLaneClassesCompatible(a: LaneClass, b: LaneClass): boolean {
  switch (a) {
    case 'centerline':
      return b === 'centerline';
    case 'road':
      return b === 'road';
    case 'cycle':
    case 'road_cycle':
      return b === 'cycle' || b === 'road_cycle';
    case 'other':
      return false;
  }
}

export function assertScannableGeometry(feature: LaneFeature): void {
  if (feature.geometryType !== 'LineString') {
    throw new MalformedGeometryError(
      feature.index,
      feature.wayId,
      `expected LineString geometry, got ${feature.geometryType}`
    );
  }
  if (feature.geometry.length < 2) {
    throw new MalformedGeometryError(
      feature.index,
      feature.wayId,
      `expected at least 2 coordinates, got ${feature.geometry.length}`
    );
  }
  for (const [x, y] of feature.geometry) {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedGeometryError(feature.index, feature.wayId, 'coordinates must be finite numbers');
    }
  }
}

/**
 * Finds endpoints that neither snap to another line's endpoint nor sit at a
 * legitimate network boundary.
 *
 * For each endpoint of each feature in a group:
 * 1. snapped if any other feature's first or last point is closer than snapTolerance
 * 2. otherwise a gap if a type-compatible feature with a different way id
 *    passes closer than strictRadius anywhere along its geometry
 */
export class GapDetector {
  private readonly thresholds: GapThresholds;
  private readonly useSpatialIndex: boolean;

  constructor(thresholds: GapThresholds, options: GapDetectionOptions = {}) {
    this.thresholds = configHelpers.validateThresholds(thresholds);
    this.useSpatialIndex = options.useSpatialIndex ?? false;
  }

  detect(group: readonly LaneFeature[], label: GroupLabel): LaneIssue[] {
    group.forEach(assertScannableGeometry);

    const grid = this.useSpatialIndex ? this.buildEndpointGrid(group) : null;
    const boxes = this.useSpatialIndex ? group.map(feature => lineBoundingBox(feature.geometry)) : null;
    const issues: LaneIssue[] = [];

    group.forEach((feature, i) => {
      const endpoints: Array<[EndpointPosition, Coordinate2D]> = [
        ['start', firstPoint(feature.geometry)],
        ['end', lastPoint(feature.geometry)]
      ];

      for (const [position, point] of endpoints) {
        const snapped = grid
          ? this.isSnappedIndexed(grid, i, point)
          : this.isSnapped(group, i, point);
        if (snapped) continue;

        if (this.hasCompatibleNeighbour(group, i, point, boxes)) {
          issues.push(createIssue(feature, position, point, label));
        }
      }
    });

    return issues;
  }

  private isSnapped(group: readonly LaneFeature[], i: number, point: Coordinate2D): boolean {
    const { snapTolerance } = this.thresholds;
    for (let j = 0; j < group.length; j++) {
      if (j === i) continue;
      const other = group[j].geometry;
      if (
        pointDistance(point, firstPoint(other)) < snapTolerance ||
        pointDistance(point, lastPoint(other)) < snapTolerance
      ) {
        return true;
      }
    }
    return false;
  }

  private isSnappedIndexed(grid: EndpointGrid<number>, i: number, point: Coordinate2D): boolean {
    for (const entry of grid.neighbours(point)) {
      if (entry.value !== i && pointDistance(point, entry.point) < this.thresholds.snapTolerance) {
        return true;
      }
    }
    return false;
  }

  private hasCompatibleNeighbour(
    group: readonly LaneFeature[],
    i: number,
    point: Coordinate2D,
    boxes: BoundingBox[] | null
  ): boolean {
    const feature = group[i];
    const { strictRadius } = this.thresholds;

    for (let j = 0; j < group.length; j++) {
      const ref = group[j];
      // Same way (including two absent way ids) cannot close its own gap
      if (j === i || ref.wayId === feature.wayId) continue;
      if (!areLaneClassesCompatible(feature.laneClass, ref.laneClass)) continue;
      if (boxes && pointToBoxDistance(point, boxes[j]) >= strictRadius) continue;

      if (pointToLineDistance(point, ref.geometry) < strictRadius) {
        return true;
      }
    }
    return false;
  }

  private buildEndpointGrid(group: readonly LaneFeature[]): EndpointGrid<number> {
    const grid = new EndpointGrid<number>(this.thresholds.snapTolerance * 2);
    group.forEach((feature, j) => {
      grid.insert(firstPoint(feature.geometry), j);
      grid.insert(lastPoint(feature.geometry), j);
    });
    return grid;
  }
}

function createIssue(
  feature: LaneFeature,
  endpoint: EndpointPosition,
  point: Coordinate2D,
  label: GroupLabel
): LaneIssue {
  const { kind, color } = GROUP_ISSUE_STYLE[label];
  const laneType = feature.laneType ?? 'none';
  const coordinate: Coordinate2D = [point[0], point[1]];
  Object.freeze(coordinate);

  return Object.freeze({
    wayId: feature.wayId,
    roadId: feature.roadId,
    coordinate,
    kind,
    laneType,
    type: `${kind} (${laneType})`,
    color,
    endpoint,
    featureIndex: feature.index
  });
}

export function detectGaps(
  group: readonly LaneFeature[],
  label: GroupLabel,
  thresholds: GapThresholds,
  options: GapDetectionOptions = {}
): LaneIssue[] {
  return new GapDetector(thresholds, options).detect(group, label);
}
