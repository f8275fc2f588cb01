import { loadLaneFeatures } from '../loaders/GeoJSONLaneLoader';
import type { LaneIntegrityOptions, LaneIntegrityRunResult } from '../types';
import { resolveLaneIntegrityOptions } from '../utils/config-loader';
import { errorMessage } from '../utils/errors';
import { writeIssueReport } from '../utils/export/issue-geojson-export';
import { LaneIntegrityValidator } from '../validation/LaneIntegrityValidator';

export interface LaneIntegrityCheckOptions extends Partial<LaneIntegrityOptions> {
  config?: string;
  exportPath?: string;
  includeFeatures?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Load, validate and optionally export a report for one GeoJSON file
 */
export async function runLaneIntegrityCheck(
  filePath: string,
  options: LaneIntegrityCheckOptions = {}
): Promise<LaneIntegrityRunResult> {
  try {
    const resolved = resolveLaneIntegrityOptions(
      {
        snapTolerance: options.snapTolerance,
        strictRadius: options.strictRadius,
        useSpatialIndex: options.useSpatialIndex,
        verbose: options.verbose
      },
      options.config
    );
    const validator = new LaneIntegrityValidator(resolved);

    const features = loadLaneFeatures(filePath);
    const report = validator.validate(features);

    if (!options.quiet) {
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        validator.printResults(report, filePath);
      }
    }

    let exportPath: string | undefined;
    if (options.exportPath) {
      exportPath = writeIssueReport(options.exportPath, report.issues, features, {
        includeFeatures: options.includeFeatures,
        verbose: resolved.verbose
      });
    }

    return { success: true, source: filePath, report, exportPath };
  } catch (error) {
    return { success: false, source: filePath, error: errorMessage(error) };
  }
}
