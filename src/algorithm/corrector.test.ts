/**
 * Boundary Corrector Tests
 */

import { correctFrame, correctFrames, needsCorrection, minimumSizeFrom } from './corrector';
import { contains } from '../geometry/rectangle';
import { Rect } from '../types/geometry';
import { STANDARD_SETTINGS } from '../../test/fixtures/settings';
import { SCREEN_16_9, SCREEN_WITH_CHROME, TINY_SCREEN } from '../../test/fixtures/screens';

const BOUNDS = SCREEN_16_9.usableFrame;
const MIN = minimumSizeFrom(STANDARD_SETTINGS);

describe('minimumSizeFrom', () => {
  it('should read the floor from settings', () => {
    expect(MIN).toEqual({ width: 200, height: 150 });
  });
});

describe('correctFrame', () => {
  it('should return a contained frame unchanged', () => {
    const frame: Rect = { x: 100, y: 100, width: 400, height: 300 };

    expect(needsCorrection(frame, BOUNDS, MIN)).toBe(false);
    expect(correctFrame(frame, BOUNDS, MIN)).toEqual(frame);
  });

  it('should center a window sticking out on the right', () => {
    expect(correctFrame({ x: 1800, y: 100, width: 400, height: 300 }, BOUNDS, MIN))
      .toEqual({ x: 760, y: 100, width: 400, height: 300 });
  });

  it('should scale a window wider than the screen to 95% of its width', () => {
    const result = correctFrame({ x: -100, y: 0, width: 2400, height: 600 }, BOUNDS, MIN);

    // Scale 0.95 * 1920 / 2400 = 0.76
    expect(result.width).toBeCloseTo(1824, 6);
    expect(result.height).toBeCloseTo(456, 6);
    expect(result.x).toBeCloseTo(48, 6);
    expect(result.y).toBe(0);
  });

  it('should give a too-tall window the full height at the top', () => {
    expect(correctFrame({ x: 100, y: -50, width: 400, height: 1200 }, BOUNDS, MIN))
      .toEqual({ x: 100, y: 0, width: 400, height: 1080 });
  });

  it('should clamp a window hanging off the bottom', () => {
    expect(correctFrame({ x: 100, y: 1000, width: 400, height: 300 }, BOUNDS, MIN))
      .toEqual({ x: 100, y: 780, width: 400, height: 300 });
  });

  it('should respect the usable frame origin', () => {
    const bounds = SCREEN_WITH_CHROME.usableFrame;

    expect(correctFrame({ x: 0, y: 0, width: 400, height: 300 }, bounds, MIN))
      .toEqual({ x: 0, y: 25, width: 400, height: 300 });
  });

  it('should grow a small window to the minimum size', () => {
    expect(correctFrame({ x: 10, y: 10, width: 50, height: 40 }, BOUNDS, MIN))
      .toEqual({ x: 10, y: 10, width: 200, height: 150 });
  });

  it('should clamp again after growing a small window in a corner', () => {
    expect(correctFrame({ x: 1900, y: 1050, width: 10, height: 10 }, BOUNDS, MIN))
      .toEqual({ x: 1720, y: 930, width: 200, height: 150 });
  });

  it('should place the floor size at the start edge of a screen smaller than the floor', () => {
    const bounds = TINY_SCREEN.usableFrame;
    const result = correctFrame({ x: 40, y: 20, width: 50, height: 50 }, bounds, MIN);

    expect(result).toEqual({ x: 0, y: 0, width: 200, height: 150 });
    expect(needsCorrection(result, bounds, MIN)).toBe(false);
  });

  describe('idempotence', () => {
    const frames: Rect[] = [
      { x: 100, y: 100, width: 400, height: 300 },
      { x: -500, y: -500, width: 5000, height: 5000 },
      { x: 1800, y: 1000, width: 400, height: 300 },
      { x: 3000, y: 2000, width: 10, height: 10 },
      { x: 0, y: 0, width: 0, height: 0 },
      { x: -100, y: 0, width: 2400, height: 600 }
    ];
    const boundsList: Rect[] = [BOUNDS, SCREEN_WITH_CHROME.usableFrame, TINY_SCREEN.usableFrame];

    it('should return the same frame when applied twice', () => {
      boundsList.forEach(bounds => {
        frames.forEach(frame => {
          const once = correctFrame(frame, bounds, MIN);
          expect(correctFrame(once, bounds, MIN)).toEqual(once);
          expect(needsCorrection(once, bounds, MIN)).toBe(false);
        });
      });
    });

    it('should always produce a contained frame on screens larger than the floor', () => {
      frames.forEach(frame => {
        const result = correctFrame(frame, BOUNDS, MIN);
        expect(contains(BOUNDS, result)).toBe(true);
        expect(result.width).toBeGreaterThanOrEqual(200);
        expect(result.height).toBeGreaterThanOrEqual(150);
      });
    });
  });
});

describe('correctFrames', () => {
  it('should report only the indices that changed', () => {
    const report = correctFrames(
      [
        { x: 0, y: 0, width: 960, height: 1080 },
        { x: 1800, y: 0, width: 400, height: 300 },
        { x: 960, y: 0, width: 960, height: 1080 },
        { x: 0, y: 0, width: 10, height: 10 }
      ],
      BOUNDS,
      MIN
    );

    expect(report.correctedIndices).toEqual([1, 3]);
    expect(report.frames[0]).toEqual({ x: 0, y: 0, width: 960, height: 1080 });
    expect(report.frames[1]).toEqual({ x: 760, y: 0, width: 400, height: 300 });
  });

  it('should handle an empty list', () => {
    expect(correctFrames([], BOUNDS, MIN)).toEqual({ frames: [], correctedIndices: [] });
  });
});
