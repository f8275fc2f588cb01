import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { configHelpers, GLOBAL_CONFIG } from '../config/lane-integrity.global.config';
import type { LaneIntegrityOptions } from '../types';
import { ConfigurationError, errorMessage } from './errors';

export const DEFAULT_CONFIG_FILENAME = 'lane-integrity.config.yaml';

/**
 * Find a config file in multiple possible directories
 */
function findConfigFile(filename: string, possiblePaths: string[]): string | null {
  for (const basePath of possiblePaths) {
    const fullPath = path.join(basePath, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  // Return null if no file found - let caller handle fallback
  return null;
}

// Values set in the YAML file; anything left out falls back to GLOBAL_CONFIG
export interface LaneIntegrityFileConfig {
  snapTolerance?: number;
  strictRadius?: number;
  useSpatialIndex?: boolean;
  verbose?: boolean;
}

let configCache: LaneIntegrityFileConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(section: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigurationError(key, `${key} in ${source} must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readBoolean(section: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(key, `${key} in ${source} must be true or false, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Map a parsed YAML document onto the file config shape
 */
export function parseConfigDocument(document: unknown, source: string): LaneIntegrityFileConfig {
  if (document === undefined || document === null) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigurationError('config', `Configuration in ${source} must be a mapping`);
  }

  const section = document.lane_integrity;
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigurationError('lane_integrity', `lane_integrity in ${source} must be a mapping`);
  }

  const config: LaneIntegrityFileConfig = {};
  const snapTolerance = readNumber(section, 'snap_tolerance', source);
  const strictRadius = readNumber(section, 'strict_radius', source);
  const useSpatialIndex = readBoolean(section, 'spatial_index', source);
  const verbose = readBoolean(section, 'verbose', source);
  if (snapTolerance !== undefined) config.snapTolerance = snapTolerance;
  if (strictRadius !== undefined) config.strictRadius = strictRadius;
  if (useSpatialIndex !== undefined) config.useSpatialIndex = useSpatialIndex;
  if (verbose !== undefined) config.verbose = verbose;
  return config;
}

function readConfigFile(configPath: string): LaneIntegrityFileConfig {
  let contents: string;
  try {
    contents = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError('config', `Failed to read configuration file ${configPath}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(contents);
  } catch (error) {
    throw new ConfigurationError('config', `Failed to parse configuration file ${configPath}: ${errorMessage(error)}`);
  }
  return parseConfigDocument(document, configPath);
}

/**
 * Load the lane integrity configuration from YAML.
 * An explicit path must exist; otherwise the default locations are searched
 * and a missing file means "use the built-in defaults".
 */
export function loadConfig(configPath?: string): LaneIntegrityFileConfig {
  if (configPath) {
    return readConfigFile(configPath);
  }
  if (configCache) {
    return configCache;
  }

  // Consumer configs first, then package defaults
  const found = findConfigFile(DEFAULT_CONFIG_FILENAME, [
    path.join(process.cwd(), 'configs'),
    path.join(__dirname, '../../configs')
  ]);

  configCache = found ? readConfigFile(found) : {};
  return configCache;
}

export function clearConfigCache(): void {
  configCache = null;
}

/**
 * Final options for a run: GLOBAL_CONFIG (defaults + env) <- YAML file <- explicit overrides.
 * Thresholds are validated here so a bad combination fails before loading any data.
 */
export function resolveLaneIntegrityOptions(
  overrides: Partial<LaneIntegrityOptions> = {},
  configPath?: string
): LaneIntegrityOptions {
  const fileConfig = loadConfig(configPath);

  const options: LaneIntegrityOptions = {
    snapTolerance: overrides.snapTolerance ?? fileConfig.snapTolerance ?? GLOBAL_CONFIG.thresholds.snapTolerance,
    strictRadius: overrides.strictRadius ?? fileConfig.strictRadius ?? GLOBAL_CONFIG.thresholds.strictRadius,
    useSpatialIndex: overrides.useSpatialIndex ?? fileConfig.useSpatialIndex ?? GLOBAL_CONFIG.processing.useSpatialIndex,
    verbose: overrides.verbose ?? fileConfig.verbose ?? GLOBAL_CONFIG.processing.verbose
  };

  configHelpers.validateThresholds(options);
  return options;
}
