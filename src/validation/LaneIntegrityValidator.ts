import chalk from 'chalk';
import { configHelpers, GLOBAL_CONFIG } from '../config/lane-integrity.global.config';
import type {
  GapThresholds,
  LaneFeature,
  LaneIntegrityOptions,
  LaneIntegrityReport,
  LaneIssue
} from '../types';
import { GapDetector } from './GapDetector';
import { IssueCollector } from './IssueCollector';
import { classifyLaneFeatures } from './LaneClassifier';

export class LaneIntegrityValidator {
  private readonly options: LaneIntegrityOptions;
  private readonly thresholds: GapThresholds;

  constructor(options: Partial<LaneIntegrityOptions> = {}) {
    this.options = {
      snapTolerance: options.snapTolerance ?? GLOBAL_CONFIG.thresholds.snapTolerance,
      strictRadius: options.strictRadius ?? GLOBAL_CONFIG.thresholds.strictRadius,
      useSpatialIndex: options.useSpatialIndex ?? GLOBAL_CONFIG.processing.useSpatialIndex,
      verbose: options.verbose ?? GLOBAL_CONFIG.processing.verbose
    };
    // Fail on bad thresholds before any feature is looked at
    this.thresholds = configHelpers.validateThresholds(this.options);
  }

  private log(message: string) {
    if (this.options.verbose) {
      console.log(`[Lane Integrity] ${message}`);
    }
  }

  /**
   * Classify the features, scan the centerline group and then the border group
   */
  validate(features: readonly LaneFeature[]): LaneIntegrityReport {
    this.log(`🔍 Validating ${features.length} features (snap_tolerance=${this.thresholds.snapTolerance}, strict_radius=${this.thresholds.strictRadius})`);

    const groups = classifyLaneFeatures(features);
    this.log(`📊 Groups: ${groups.centerline.length} centerlines, ${groups.border.length} unenclosed borders, ${groups.ignored.length} ignored`);

    const detector = new GapDetector(this.thresholds, { useSpatialIndex: this.options.useSpatialIndex });
    const collector = new IssueCollector();

    const centerlineIssues = detector.detect(groups.centerline, 'centerline');
    this.log(`🛣️  Centerline pass: ${centerlineIssues.length} gaps`);
    const borderIssues = detector.detect(groups.border, 'border');
    this.log(`🚧 Border pass: ${borderIssues.length} gaps`);

    // Nothing is collected until both passes succeed
    collector.addAll(centerlineIssues);
    collector.addAll(borderIssues);

    return {
      issues: collector.toArray(),
      issueCount: collector.count,
      countsByKind: collector.countsByKind(),
      groupSizes: {
        centerline: groups.centerline.length,
        border: groups.border.length,
        ignored: groups.ignored.length
      },
      thresholds: { ...this.thresholds }
    };
  }

  printResults(report: LaneIntegrityReport, source: string): void {
    console.log(chalk.blue(`\n🔍 Lane Integrity Report for ${source}`));
    console.log(chalk.blue('='.repeat(60)));

    // Summary
    console.log(chalk.white(`\n📊 Summary:`));
    console.log(`   Centerlines checked: ${report.groupSizes.centerline}`);
    console.log(`   Unenclosed borders checked: ${report.groupSizes.border}`);
    console.log(`   Ignored features: ${report.groupSizes.ignored}`);
    console.log(`   snap_tolerance: ${report.thresholds.snapTolerance}, strict_radius: ${report.thresholds.strictRadius}`);

    // Issues
    if (report.issues.length > 0) {
      console.log(chalk.white(`\n⚠️  Gaps Found:`));
      report.issues.forEach(issue => {
        console.log(`   ${formatIssueLine(issue)}`);
      });
    } else {
      console.log(chalk.green(`\n✅ No gaps found!`));
    }

    console.log(`\nNumber of issues detected: ${report.issueCount}`);
  }
}

export function formatIssueLine(issue: LaneIssue): string {
  const color = issue.color === 'magenta' ? chalk.magenta : chalk.red;
  return `${color(issue.type)} at ${configHelpers.formatCoordinate(issue.coordinate)} road_id:${issue.roadId ?? 'None'} way_id:${issue.wayId ?? 'None'}`;
}

/**
 * One-shot validation with explicit options
 */
export function checkLaneIntegrity(
  features: readonly LaneFeature[],
  options: Partial<LaneIntegrityOptions> = {}
): LaneIntegrityReport {
  return new LaneIntegrityValidator(options).validate(features);
}
