import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runLaneIntegrityCheck } from '../services/LaneIntegrityCheckService';

const FIXTURE_PATH = path.resolve(__dirname, 'fixtures/sample-lanes.geojson');

describe('runLaneIntegrityCheck', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lane-integrity-cli-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('checks a map and exports the report', async () => {
    const exportPath = path.join(tmpDir, 'issues.geojson');

    const result = await runLaneIntegrityCheck(FIXTURE_PATH, {
      snapTolerance: 1e-7,
      strictRadius: 1e-5,
      exportPath,
      includeFeatures: true,
      quiet: true
    });

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.report?.issueCount).toBe(4);
    expect(result.exportPath).toBe(exportPath);

    const written = JSON.parse(fs.readFileSync(exportPath, 'utf8'));
    // 7 line features as background, the polygon left out, then 4 issues
    expect(written.features).toHaveLength(11);
  });

  it('prints the report as JSON', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    try {
      const result = await runLaneIntegrityCheck(FIXTURE_PATH, { snapTolerance: 1e-7, strictRadius: 1e-5, json: true });

      expect(result.success).toBe(true);
      expect(logSpy).toHaveBeenCalledTimes(1);
      const printed = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(printed.issueCount).toBe(4);
      expect(printed.countsByKind).toEqual({ CENTERLINE_GAP: 2, BORDER_GAP: 2 });
    } finally {
      logSpy.mockRestore();
    }
  });

  it('returns a failed result for a missing file', async () => {
    const missing = path.join(tmpDir, 'missing.geojson');
    const result = await runLaneIntegrityCheck(missing, { quiet: true });

    expect(result.success).toBe(false);
    expect(result.source).toBe(missing);
    expect(result.error).toMatch(/^Failed to read /);
  });

  it('fails on bad thresholds before reading the map', async () => {
    const result = await runLaneIntegrityCheck(path.join(tmpDir, 'missing.geojson'), {
      snapTolerance: 1,
      strictRadius: 0.5,
      quiet: true
    });

    expect(result.success).toBe(false);
    expect(result.error).toBe('snap_tolerance (1) must be smaller than strict_radius (0.5)');
  });
});

describe('package entry point', () => {
  afterEach(() => {
    jest.dontMock('commander');
  });

  it('exposes the runner without loading the command line', () => {
    jest.isolateModules(() => {
      jest.doMock('commander', () => {
        throw new Error('commander should not be loaded by the library');
      });
      const entry: typeof import('../index') = require('../index');

      expect(typeof entry.runLaneIntegrityCheck).toBe('function');
    });
  });
});
