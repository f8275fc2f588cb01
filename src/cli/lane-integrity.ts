#!/usr/bin/env node
/**
 * Lane Integrity CLI
 *
 * Checks a GeoJSON lane map for endpoints that should connect to another
 * line of the same kind but do not:
 * - centerline gaps (magenta)
 * - unenclosed road / cycle border gaps (red)
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { LANE_INTEGRITY_VERSION } from '../constants';
import { runLaneIntegrityCheck } from '../services/LaneIntegrityCheckService';

interface CheckCommandOptions {
  snapTolerance?: number;
  strictRadius?: number;
  config?: string;
  spatialIndex?: boolean;
  export?: string;
  includeFeatures?: boolean;
  json?: boolean;
  failOnIssues?: boolean;
  verbose?: boolean;
}

function parseDistance(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

const program = new Command();

program
  .name('lane-integrity')
  .description('Detect unsnapped endpoints in road lane maps')
  .version(LANE_INTEGRITY_VERSION);

program
  .command('check')
  .description('Check a GeoJSON lane map for centerline and border gaps')
  .argument('<file>', 'GeoJSON FeatureCollection of lane lines')
  .option('--snap-tolerance <distance>', 'Distance below which two endpoints are coincident', parseDistance)
  .option('--strict-radius <distance>', 'Distance within which an unsnapped endpoint is a gap', parseDistance)
  .option('-c, --config <path>', 'YAML configuration file')
  .option('--spatial-index', 'Use a grid/bounding-box pre-filter for large inputs')
  .option('-o, --export <path>', 'Write a GeoJSON issue report')
  .option('--include-features', 'Include the lane lines in the exported report')
  .option('--json', 'Print the report as JSON')
  .option('--fail-on-issues', 'Exit with code 1 when gaps are found')
  .option('-v, --verbose', 'Log each stage')
  .action(async (file: string, options: CheckCommandOptions) => {
    if (!options.json) {
      console.log(chalk.blue(`🔍 Checking lane integrity for: ${file}`));
    }

    const result = await runLaneIntegrityCheck(file, {
      snapTolerance: options.snapTolerance,
      strictRadius: options.strictRadius,
      useSpatialIndex: options.spatialIndex,
      verbose: options.verbose,
      config: options.config,
      exportPath: options.export,
      includeFeatures: options.includeFeatures,
      json: options.json
    });

    if (!result.success) {
      console.error(chalk.red('❌ Lane integrity check failed:'), result.error);
      process.exit(1);
    }

    if (result.exportPath && !options.json) {
      console.log(chalk.green(`📁 Issue report written to ${result.exportPath}`));
    }

    if (options.failOnIssues && result.report && result.report.issueCount > 0) {
      process.exit(1);
    }
  });

// Export for programmatic use
export async function runLaneIntegrityCli(args: string[] = process.argv): Promise<void> {
  await program.parseAsync(args);
}

// Run if called directly
if (require.main === module) {
  runLaneIntegrityCli().catch(error => {
    console.error(chalk.red('❌ Unexpected error:'), error);
    process.exit(1);
  });
}
