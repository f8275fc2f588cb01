import { classifyLaneFeatures } from '../validation/LaneClassifier';
import {
  createLaneFeature,
  isUnenclosedAreaType,
  normalizeLaneFeature,
  normalizeLaneType,
  toFeatureId,
  toLaneClass
} from '../validation/lane-normalization';
import type { LanePropertyBag } from '../types';

const line = (index: number, properties: LanePropertyBag) => createLaneFeature(index, [[0, index], [1, index]], properties);

describe('lane normalization', () => {
  it('lower-cases and stringifies lane types', () => {
    expect(normalizeLaneType('CenterLine')).toBe('centerline');
    expect(normalizeLaneType(42)).toBe('42');
    expect(normalizeLaneType(true)).toBe('true');
    expect(normalizeLaneType(undefined)).toBeNull();
    expect(normalizeLaneType(null)).toBeNull();
  });

  it('maps lane types onto the closed class set', () => {
    expect(toLaneClass('centerline')).toBe('centerline');
    expect(toLaneClass('road')).toBe('road');
    expect(toLaneClass('cycle')).toBe('cycle');
    expect(toLaneClass('road_cycle')).toBe('road_cycle');
    expect(toLaneClass('cycle_track')).toBe('other');
    expect(toLaneClass(null)).toBe('other');
  });

  it('recognizes null-like area types as unenclosed', () => {
    expect(isUnenclosedAreaType(null)).toBe(true);
    expect(isUnenclosedAreaType('null')).toBe(true);
    expect(isUnenclosedAreaType('none')).toBe(true);
    expect(isUnenclosedAreaType('')).toBe(true);
    expect(isUnenclosedAreaType('junction')).toBe(false);
  });

  it('builds a typed feature from a raw property bag', () => {
    const feature = normalizeLaneFeature(
      3,
      { type: 'LineString', coordinates: [[1, 2, 30], [3, 4, 31]] },
      { lane_type: 'ROAD', area_type: 'None', way_id: 17, road_id: 'r-9', name: 'ignored' }
    );

    expect(feature).toEqual({
      index: 3,
      geometryType: 'LineString',
      geometry: [[1, 2], [3, 4]],
      wayId: 17,
      roadId: 'r-9',
      laneType: 'road',
      laneClass: 'road',
      areaType: 'none',
      enclosed: false
    });
  });

  it('treats missing properties as absent', () => {
    const feature = normalizeLaneFeature(0, { type: 'LineString', coordinates: [[0, 0], [1, 1]] }, null);

    expect(feature.laneType).toBeNull();
    expect(feature.laneClass).toBe('other');
    expect(feature.wayId).toBeNull();
    expect(feature.roadId).toBeNull();
    expect(feature.enclosed).toBe(false);
  });

  it('keeps non-line geometries with no coordinates', () => {
    const feature = normalizeLaneFeature(
      1,
      { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]] },
      { lane_type: 'crosswalk' }
    );

    expect(feature.geometryType).toBe('Polygon');
    expect(feature.geometry).toEqual([]);
  });

  it('keeps ids by value', () => {
    expect(toFeatureId(7)).toBe(7);
    expect(toFeatureId('w-7')).toBe('w-7');
    expect(toFeatureId(undefined)).toBeNull();
    expect(toFeatureId({ osm: 7, version: 2 })).toBe('{"osm":7,"version":2}');
    expect(toFeatureId([1, 2])).toBe('[1,2]');
    expect(toFeatureId(true)).toBe('true');
  });

  it('records a missing geometry', () => {
    expect(normalizeLaneFeature(0, null, { lane_type: 'road' }).geometryType).toBe('None');
  });
});

describe('classifyLaneFeatures', () => {
  it('partitions centerlines and unenclosed borders in input order', () => {
    const features = [
      line(0, { lane_type: 'road', area_type: null }),
      line(1, { lane_type: 'CENTERLINE' }),
      line(2, { lane_type: 'cycle' }),
      line(3, { lane_type: 'road_cycle', area_type: 'NULL' }),
      line(4, { lane_type: 'centerline', area_type: 'junction_3' }),
      line(5, { lane_type: 'road', area_type: '' })
    ];

    const groups = classifyLaneFeatures(features);

    expect(groups.centerline.map(f => f.index)).toEqual([1, 4]);
    expect(groups.border.map(f => f.index)).toEqual([0, 2, 3, 5]);
    expect(groups.ignored).toEqual([]);
  });

  it('leaves enclosed borders and unrecognized types out of both groups', () => {
    const features = [
      line(0, { lane_type: 'road', area_type: 'junction_1' }),
      line(1, { lane_type: 'sidewalk' }),
      line(2, { lane_type: 'cycle_track' }),
      line(3, {}),
      line(4, { lane_type: 'road', area_type: 'None' })
    ];

    const groups = classifyLaneFeatures(features);

    expect(groups.centerline).toEqual([]);
    expect(groups.border.map(f => f.index)).toEqual([4]);
    expect(groups.ignored.map(f => f.index)).toEqual([0, 1, 2, 3]);
  });

  it('never places a feature in both groups', () => {
    const features = [
      line(0, { lane_type: 'centerline' }),
      line(1, { lane_type: 'road' }),
      line(2, { lane_type: 'cycle', area_type: 'zone' })
    ];

    const groups = classifyLaneFeatures(features);
    const seen = [...groups.centerline, ...groups.border, ...groups.ignored].map(f => f.index).sort();

    expect(seen).toEqual([0, 1, 2]);
  });
});
