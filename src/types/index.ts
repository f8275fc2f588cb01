/**
 * Lane Integrity Type Definitions
 */

// Coordinate types
export type Coordinate2D = [number, number]; // [x, y] - lng/lat or projected

// Bounding box
export interface BoundingBox {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

// Identifiers passed through from the source properties (structured ids as JSON text)
export type FeatureId = string | number;

/**
 * Recognized lane classes. Anything else collapses into 'other' and never
 * takes part in gap detection.
 */
export type LaneClass = 'centerline' | 'road' | 'cycle' | 'road_cycle' | 'other';

export type EndpointPosition = 'start' | 'end';

/**
 * One input line feature, normalized once at ingestion.
 */
export interface LaneFeature {
  index: number;                         // position in the input collection
  geometryType: string;                  // only LineString is scanned
  geometry: readonly Coordinate2D[];
  wayId: FeatureId | null;
  roadId: FeatureId | null;
  laneType: string | null;               // lower-cased source lane_type
  laneClass: LaneClass;
  areaType: string | null;               // lower-cased source area_type
  enclosed: boolean;                     // owned by an area/region
}

// Raw property bag as it comes out of a GeoJSON feature
export interface LanePropertyBag {
  lane_type?: unknown;
  area_type?: unknown;
  way_id?: unknown;
  road_id?: unknown;
  [key: string]: unknown;
}

export type GroupLabel = 'centerline' | 'border';

export interface LaneGroups {
  centerline: LaneFeature[];
  border: LaneFeature[];
  ignored: LaneFeature[];
}

// Issue types
export type GapKind = 'CENTERLINE_GAP' | 'BORDER_GAP';
export type IssueColor = 'magenta' | 'red';

export interface LaneIssue {
  readonly wayId: FeatureId | null;
  readonly roadId: FeatureId | null;
  readonly coordinate: Readonly<Coordinate2D>;
  readonly kind: GapKind;
  readonly laneType: string;
  readonly type: string;                 // display label, e.g. "CENTERLINE_GAP (centerline)"
  readonly color: IssueColor;
  readonly endpoint: EndpointPosition;
  readonly featureIndex: number;
}

// Configuration types
export interface GapThresholds {
  snapTolerance: number;                 // endpoints closer than this are the same node
  strictRadius: number;                  // unsnapped endpoints closer than this to a compatible line are gaps
}

export interface GapDetectionOptions {
  useSpatialIndex?: boolean;
}

export interface LaneIntegrityOptions extends GapThresholds {
  useSpatialIndex: boolean;
  verbose: boolean;
}

// Validation report
export interface LaneIntegrityReport {
  issues: readonly LaneIssue[];
  issueCount: number;
  countsByKind: Record<GapKind, number>;
  groupSizes: {
    centerline: number;
    border: number;
    ignored: number;
  };
  thresholds: GapThresholds;
}

export * from './ServiceResult';
