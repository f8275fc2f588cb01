import type { LaneFeature, LaneGroups } from '../types';
import { isBorderLaneClass } from './lane-normalization';

export function isCenterline(feature: LaneFeature): boolean {
  return feature.laneClass === 'centerline';
}

export function isUnenclosedBorder(feature: LaneFeature): boolean {
  return isBorderLaneClass(feature.laneClass) && !feature.enclosed;
}

/**
 * Partition features into the groups gap detection runs over.
 * Input order is kept inside each group.
 */
export function classifyLaneFeatures(features: readonly LaneFeature[]): LaneGroups {
  const groups: LaneGroups = { centerline: [], border: [], ignored: [] };

  for (const feature of features) {
    if (isCenterline(feature)) {
      groups.centerline.push(feature);
    } else if (isUnenclosedBorder(feature)) {
      groups.border.push(feature);
    } else {
      groups.ignored.push(feature);
    }
  }

  return groups;
}
