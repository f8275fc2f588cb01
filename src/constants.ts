/**
 * Lane Integrity Constants
 */

import type { GapKind, GroupLabel, IssueColor } from './types';

export const LANE_INTEGRITY_VERSION = '1.0.0';

export const DEFAULT_THRESHOLDS = {
  SNAP_TOLERANCE: 1e-7,
  STRICT_RADIUS: 1e-5 // ~1 meter in degrees at mid latitudes
} as const;

export const BORDER_LANE_TYPES = ['road', 'cycle', 'road_cycle'] as const;

// area_type values that mean "not owned by any area"
export const UNENCLOSED_AREA_TOKENS = ['null', 'none', ''] as const;

export const GROUP_ISSUE_STYLE: Record<GroupLabel, { kind: GapKind; color: IssueColor }> = {
  centerline: { kind: 'CENTERLINE_GAP', color: 'magenta' },
  border: { kind: 'BORDER_GAP', color: 'red' }
};

export const REPORT_STYLING = {
  centerline: { stroke: 'blue', strokeOpacity: 0.8, strokeWidth: 2.0 },
  cycle: { stroke: 'orange', strokeOpacity: 0.7, strokeWidth: 1.5 },
  default: { stroke: 'green', strokeOpacity: 0.6, strokeWidth: 1.2 }
} as const;
