import type { Geometry } from 'geojson';
import { BORDER_LANE_TYPES, UNENCLOSED_AREA_TOKENS } from '../constants';
import type { Coordinate2D, FeatureId, LaneClass, LaneFeature, LanePropertyBag } from '../types';

export function normalizeLaneType(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value).toLowerCase();
}

export function toLaneClass(laneType: string | null): LaneClass {
  switch (laneType) {
    case 'centerline':
    case 'road':
    case 'cycle':
    case 'road_cycle':
      return laneType;
    default:
      return 'other';
  }
}

const BORDER_CLASSES: ReadonlySet<string> = new Set<string>(BORDER_LANE_TYPES);
const UNENCLOSED_TOKENS: ReadonlySet<string> = new Set<string>(UNENCLOSED_AREA_TOKENS);

export function isBorderLaneClass(laneClass: LaneClass): boolean {
  return BORDER_CLASSES.has(laneClass);
}

/**
 * A border is unenclosed when area_type is absent or one of the null-like tokens
 */
export function isUnenclosedAreaType(areaType: string | null): boolean {
  return areaType === null || UNENCLOSED_TOKENS.has(areaType);
}

/**
 * Ids pass through as given. Structured ids (objects, arrays) are kept in
 * their JSON form so two ids compare equal only when their values match.
 */
export function toFeatureId(value: unknown): FeatureId | null {
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

// Non-numeric positions are kept as NaN so the detector can reject them
function toCoordinate(position: unknown): Coordinate2D {
  if (Array.isArray(position) && position.length >= 2) {
    const x: unknown = position[0];
    const y: unknown = position[1];
    return [typeof x === 'number' ? x : NaN, typeof y === 'number' ? y : NaN];
  }
  return [NaN, NaN];
}

export function extractLineCoordinates(geometry: Geometry | null | undefined): { geometryType: string; coordinates: Coordinate2D[] } {
  if (!geometry) {
    return { geometryType: 'None', coordinates: [] };
  }
  if (geometry.type !== 'LineString') {
    return { geometryType: geometry.type, coordinates: [] };
  }
  const positions: unknown = geometry.coordinates;
  if (!Array.isArray(positions)) {
    return { geometryType: geometry.type, coordinates: [] };
  }
  return { geometryType: geometry.type, coordinates: positions.map(toCoordinate) };
}

/**
 * Build a typed LaneFeature from a geometry and its raw property bag
 */
export function normalizeLaneFeature(
  index: number,
  geometry: Geometry | null | undefined,
  properties: LanePropertyBag | null | undefined
): LaneFeature {
  const props: LanePropertyBag = properties ?? {};
  const { geometryType, coordinates } = extractLineCoordinates(geometry);
  const laneType = normalizeLaneType(props.lane_type);
  const areaType = normalizeLaneType(props.area_type);

  return {
    index,
    geometryType,
    geometry: coordinates,
    wayId: toFeatureId(props.way_id),
    roadId: toFeatureId(props.road_id),
    laneType,
    laneClass: toLaneClass(laneType),
    areaType,
    enclosed: !isUnenclosedAreaType(areaType)
  };
}

/**
 * Build a LaneFeature straight from coordinates (programmatic callers, tests)
 */
export function createLaneFeature(
  index: number,
  coordinates: Coordinate2D[],
  properties: LanePropertyBag = {}
): LaneFeature {
  return normalizeLaneFeature(index, { type: 'LineString', coordinates }, properties);
}
