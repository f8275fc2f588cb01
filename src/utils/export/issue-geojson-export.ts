import * as fs from 'fs';
import * as path from 'path';
import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';
import { REPORT_STYLING } from '../../constants';
import type { LaneFeature, LaneIssue } from '../../types';

export interface IssueReportOptions {
  // Include the scanned line features as styled background
  includeFeatures?: boolean;
  verbose?: boolean;
}

function lineStyle(feature: LaneFeature) {
  if (feature.laneClass === 'centerline') {
    return REPORT_STYLING.centerline;
  }
  if (feature.laneType?.includes('cycle')) {
    return REPORT_STYLING.cycle;
  }
  return REPORT_STYLING.default;
}

function toBackgroundFeature(feature: LaneFeature): Feature<Geometry, GeoJsonProperties> {
  const style = lineStyle(feature);
  return {
    type: 'Feature',
    geometry: {
      type: 'LineString',
      coordinates: feature.geometry.map(([x, y]) => [x, y])
    },
    properties: {
      layer: 'lanes',
      way_id: feature.wayId,
      road_id: feature.roadId,
      lane_type: feature.laneType,
      stroke: style.stroke,
      'stroke-opacity': style.strokeOpacity,
      'stroke-width': style.strokeWidth
    }
  };
}

function toIssueFeature(issue: LaneIssue): Feature<Geometry, GeoJsonProperties> {
  return {
    type: 'Feature',
    geometry: {
      type: 'Point',
      coordinates: [issue.coordinate[0], issue.coordinate[1]]
    },
    properties: {
      layer: 'issues',
      way_id: issue.wayId,
      road_id: issue.roadId,
      type: issue.type,
      kind: issue.kind,
      lane_type: issue.laneType,
      endpoint: issue.endpoint,
      color: issue.color,
      'marker-color': issue.color
    }
  };
}

/**
 * Issue report as a GeoJSON FeatureCollection: background lines first (optional), then issue points
 */
export function buildIssueReport(
  issues: readonly LaneIssue[],
  features: readonly LaneFeature[] = [],
  options: IssueReportOptions = {}
): FeatureCollection {
  const background = options.includeFeatures
    ? features.filter(f => f.geometryType === 'LineString' && f.geometry.length >= 2).map(toBackgroundFeature)
    : [];

  return {
    type: 'FeatureCollection',
    features: [...background, ...issues.map(toIssueFeature)]
  };
}

export function writeIssueReport(
  outputPath: string,
  issues: readonly LaneIssue[],
  features: readonly LaneFeature[] = [],
  options: IssueReportOptions = {}
): string {
  const collection = buildIssueReport(issues, features, options);
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, JSON.stringify(collection, null, 2));

  if (options.verbose) {
    console.log(`[GeoJSON Export] ✅ Wrote ${collection.features.length} features to ${resolved}`);
  }
  return resolved;
}
