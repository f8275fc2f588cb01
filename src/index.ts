/**
 * LANE INTEGRITY - Topology checks for road lane maps
 *
 * Finds centerline and lane-border endpoints that should connect to another
 * line of the same kind but are left dangling.
 */

// Core exports
export { classifyLaneFeatures, isCenterline, isUnenclosedBorder } from './validation/LaneClassifier';
export { GapDetector, detectGaps, areLaneClassesCompatible, assertScannableGeometry } from './validation/GapDetector';
export { IssueCollector } from './validation/IssueCollector';
export { LaneIntegrityValidator, checkLaneIntegrity, formatIssueLine } from './validation/LaneIntegrityValidator';
export {
  normalizeLaneFeature,
  createLaneFeature,
  normalizeLaneType,
  isUnenclosedAreaType,
  toLaneClass
} from './validation/lane-normalization';

// Data in/out
export { loadLaneFeatures, parseLaneFeatureCollection } from './loaders/GeoJSONLaneLoader';
export { buildIssueReport, writeIssueReport } from './utils/export/issue-geojson-export';
export type { IssueReportOptions } from './utils/export/issue-geojson-export';

// Configuration
export { GLOBAL_CONFIG, configHelpers } from './config/lane-integrity.global.config';
export { loadConfig, clearConfigCache, resolveLaneIntegrityOptions } from './utils/config-loader';
export type { LaneIntegrityFileConfig } from './utils/config-loader';

// Errors
export { MalformedGeometryError, ConfigurationError, LaneDataLoadError } from './utils/errors';

// Types
export * from './types';

// Runner
export { runLaneIntegrityCheck } from './services/LaneIntegrityCheckService';
export type { LaneIntegrityCheckOptions } from './services/LaneIntegrityCheckService';

// Constants
export * from './constants';
