import type { GapKind, LaneIssue } from '../types';

/**
 * Accumulates gap issues in discovery order. No deduplication: the detector
 * raises at most one issue per endpoint.
 */
export class IssueCollector {
  private issues: LaneIssue[] = [];

  add(issue: LaneIssue): void {
    this.issues.push(issue);
  }

  addAll(issues: readonly LaneIssue[]): void {
    for (const issue of issues) {
      this.add(issue);
    }
  }

  get count(): number {
    return this.issues.length;
  }

  countsByKind(): Record<GapKind, number> {
    const counts: Record<GapKind, number> = { CENTERLINE_GAP: 0, BORDER_GAP: 0 };
    for (const issue of this.issues) {
      counts[issue.kind]++;
    }
    return counts;
  }

  toArray(): readonly LaneIssue[] {
    return Object.freeze([...this.issues]);
  }
}
