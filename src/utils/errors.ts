import type { FeatureId } from '../types';

/**
 * A feature entering a gap scan whose geometry cannot be scanned
 */
export class MalformedGeometryError extends Error {
  constructor(
    public readonly featureIndex: number,
    public readonly wayId: FeatureId | null,
    public readonly reason: string
  ) {
    super(`Malformed geometry for feature ${featureIndex} (way_id: ${wayId ?? 'none'}): ${reason}`);
    this.name = 'MalformedGeometryError';
  }
}

/**
 * Invalid thresholds or an unreadable configuration file
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Lane data load error
 */
export class LaneDataLoadError extends Error {
  constructor(
    public readonly code:
      | 'READ_FAILED'
      | 'PARSE_ERROR'
      | 'INVALID_GEOJSON',
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'LaneDataLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
