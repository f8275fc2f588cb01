// Global configuration constants for Lane Integrity
// Environment overrides are read once at load time; YAML and CLI flags layer on top (see utils/config-loader)

import { DEFAULT_THRESHOLDS } from '../constants';
import type { GapThresholds } from '../types';
import { ConfigurationError } from '../utils/errors';

export const GLOBAL_CONFIG = {
  // Gap detection thresholds (source coordinate units)
  thresholds: {
    snapTolerance: parseFloat(process.env.LANE_SNAP_TOLERANCE || String(DEFAULT_THRESHOLDS.SNAP_TOLERANCE)),
    strictRadius: parseFloat(process.env.LANE_STRICT_RADIUS || String(DEFAULT_THRESHOLDS.STRICT_RADIUS)),
  },

  // Processing configuration
  processing: {
    useSpatialIndex: process.env.LANE_SPATIAL_INDEX === 'true',
    verbose: process.env.LANE_INTEGRITY_VERBOSE === 'true',
  },

  // Terminal output
  display: {
    coordinatePrecision: 8, // Decimal places when printing issue coordinates
  },
} as const;

// Helper functions for configuration
export const configHelpers = {
  /**
   * Reject thresholds the gap scan cannot run with.
   * snapTolerance >= strictRadius would flag every unsnapped endpoint in range.
   */
  validateThresholds(thresholds: GapThresholds): GapThresholds {
    const { snapTolerance, strictRadius } = thresholds;
    if (!Number.isFinite(snapTolerance) || snapTolerance <= 0) {
      throw new ConfigurationError('snapTolerance', `snap_tolerance must be a positive number, got ${snapTolerance}`);
    }
    if (!Number.isFinite(strictRadius) || strictRadius <= 0) {
      throw new ConfigurationError('strictRadius', `strict_radius must be a positive number, got ${strictRadius}`);
    }
    if (snapTolerance >= strictRadius) {
      throw new ConfigurationError(
        'snapTolerance',
        `snap_tolerance (${snapTolerance}) must be smaller than strict_radius (${strictRadius})`
      );
    }
    return { snapTolerance, strictRadius };
  },

  /**
   * Format a coordinate for terminal output
   */
  formatCoordinate(coordinate: Readonly<[number, number]>): string {
    const precision = GLOBAL_CONFIG.display.coordinatePrecision;
    return `(${coordinate[0].toFixed(precision)}, ${coordinate[1].toFixed(precision)})`;
  },
};
