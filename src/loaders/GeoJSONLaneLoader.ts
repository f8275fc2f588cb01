import * as fs from 'fs';
import type { Geometry } from 'geojson';
import type { LaneFeature, LanePropertyBag } from '../types';
import { errorMessage, LaneDataLoadError } from '../utils/errors';
import { normalizeLaneFeature } from '../validation/lane-normalization';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGeometry(value: unknown): value is Geometry {
  return isRecord(value) && typeof value.type === 'string';
}

/**
 * Turn a parsed GeoJSON FeatureCollection into normalized lane features.
 * Features keep their position in the collection as their index.
 */
export function parseLaneFeatureCollection(document: unknown, filePath?: string): LaneFeature[] {
  if (!isRecord(document) || document.type !== 'FeatureCollection' || !Array.isArray(document.features)) {
    throw new LaneDataLoadError('INVALID_GEOJSON', 'Expected a GeoJSON FeatureCollection with a features array', filePath);
  }

  const features: unknown[] = document.features;
  return features.map((feature, index) => {
    if (!isRecord(feature) || feature.type !== 'Feature') {
      throw new LaneDataLoadError('INVALID_GEOJSON', `Entry ${index} is not a GeoJSON Feature`, filePath);
    }
    const geometry = isGeometry(feature.geometry) ? feature.geometry : null;
    const properties: LanePropertyBag | null = isRecord(feature.properties) ? feature.properties : null;
    return normalizeLaneFeature(index, geometry, properties);
  });
}

/**
 * Read lane features from a GeoJSON file
 */
export function loadLaneFeatures(filePath: string): LaneFeature[] {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new LaneDataLoadError('READ_FAILED', `Failed to read ${filePath}: ${errorMessage(error)}`, filePath);
  }

  let document: unknown;
  try {
    document = JSON.parse(contents);
  } catch (error) {
    throw new LaneDataLoadError('PARSE_ERROR', `Invalid JSON in ${filePath}: ${errorMessage(error)}`, filePath);
  }

  return parseLaneFeatureCollection(document, filePath);
}
