import { describe, it, expect } from 'vitest';
import {
  frameCountFor,
  getDefaultTitle,
  isChartFormat,
  resolveRenderConfig,
} from '../../src/config.js';
import { resolveOutputPath, fileTimestamp } from '../../src/output.js';
import { InvalidConfigurationError } from '../../src/utils/errors.js';

const SERIES = ['A', 'B', 'C'];

describe('resolveRenderConfig', () => {
  it('should apply defaults', () => {
    const config = resolveRenderConfig({ title: 'Big race' }, SERIES);
    expect(config).toEqual({
      width: 1080,
      height: 1080,
      dpi: 100,
      fps: 30,
      duration: 8,
      frameCount: 240,
      showGridlines: true,
      title: 'BIG RACE',
      attribution: 'PER MARKET DATA',
      series: ['A', 'B', 'C'],
    });
  });

  it('should keep only the first maxCandidates series', () => {
    expect(resolveRenderConfig({ title: 't', maxCandidates: 2 }, SERIES).series).toEqual(['A', 'B']);
  });

  it('should honour an explicit display list and its order', () => {
    expect(resolveRenderConfig({ title: 't', series: ['C', 'A'] }, SERIES).series).toEqual(['C', 'A']);
  });

  it('should reject non-positive fps and duration', () => {
    expect(() => resolveRenderConfig({ title: 't', fps: 0 }, SERIES)).toThrow(InvalidConfigurationError);
    expect(() => resolveRenderConfig({ title: 't', duration: -1 }, SERIES)).toThrow(
      InvalidConfigurationError
    );
  });

  it('should reject durations too short for a single frame', () => {
    expect(() => resolveRenderConfig({ title: 't', fps: 1, duration: 0.2 }, SERIES)).toThrow(
      'yields no frames'
    );
  });

  it('should list every unknown or repeated series', () => {
    try {
      resolveRenderConfig({ title: 't', series: ['A', 'X', 'A', 'Y'] }, SERIES);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (!(error instanceof InvalidConfigurationError)) return;
      expect(error.issues).toEqual([
        'series: unknown series "X"',
        'series: "A" is listed twice',
        'series: unknown series "Y"',
      ]);
    }
  });

  it('should report the path of each schema issue', () => {
    try {
      resolveRenderConfig({ title: 't', fps: 2.5, maxCandidates: 0 }, SERIES);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof InvalidConfigurationError)) throw error;
      expect(error.issues.map(issue => issue.split(':')[0]).sort()).toEqual(['fps', 'maxCandidates']);
    }
  });
});

describe('frameCountFor', () => {
  it('should round fps × duration', () => {
    expect(frameCountFor(30, 8)).toBe(240);
    expect(frameCountFor(25, 3.3)).toBe(83);
  });
});

describe('isChartFormat', () => {
  it('should know the square format only', () => {
    expect(isChartFormat('square')).toBe(true);
    expect(isChartFormat('portrait')).toBe(false);
    expect(isChartFormat('toString')).toBe(false);
  });
});

describe('getDefaultTitle', () => {
  it('should use the curated title for known series', () => {
    expect(getDefaultTitle('KXNFLMVP')).toBe('WHO WILL WIN NFL MVP?');
  });

  it('should derive a title from other tickers', () => {
    expect(getDefaultTitle('KXBEST_PICTURE')).toBe('BEST PICTURE MARKET');
  });
});

describe('resolveOutputPath', () => {
  const now = new Date(2024, 5, 9, 14, 3, 7);

  it('should add .mp4 to explicit names without a video extension', () => {
    expect(resolveOutputPath({ output: 'election', directory: '/out' })).toBe('/out/election.mp4');
    expect(resolveOutputPath({ output: 'race.mov', directory: '/out' })).toBe('/out/race.mov');
  });

  it('should keep absolute explicit paths', () => {
    expect(resolveOutputPath({ output: '/tmp/a.mp4', directory: '/out' })).toBe('/tmp/a.mp4');
  });

  it('should name generated files after the ticker and time', () => {
    expect(resolveOutputPath({ seriesTicker: 'KXTEST', directory: '/out', now })).toBe(
      '/out/KXTEST_20240609_140307.mp4'
    );
    expect(resolveOutputPath({ directory: '/out', now })).toBe('/out/bar_race_20240609_140307.mp4');
  });

  it('should format file timestamps in local time', () => {
    expect(fileTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102_030405');
  });
});
