/**
 * Basic Layout Mode Tests
 */

import {
  gridDimensions,
  gridLayout,
  horizontalLayout,
  verticalLayout,
  cascadeLayout,
  fibonacciLayout,
  focusLayout
} from './basic';
import { STANDARD_SETTINGS, ZERO_PADDING_SETTINGS } from '../../../test/fixtures/settings';
import { SCREEN_16_9, SCREEN_1_1, SCREEN_WITH_CHROME } from '../../../test/fixtures/screens';

const FRAME = SCREEN_16_9.usableFrame;

describe('gridDimensions', () => {
  it('should pick a near-square grid', () => {
    expect(gridDimensions(1)).toEqual({ columns: 1, rows: 1 });
    expect(gridDimensions(4)).toEqual({ columns: 2, rows: 2 });
    expect(gridDimensions(5)).toEqual({ columns: 3, rows: 2 });
    expect(gridDimensions(10)).toEqual({ columns: 4, rows: 3 });
  });

  it('should return an empty grid for zero windows', () => {
    expect(gridDimensions(0)).toEqual({ columns: 0, rows: 0 });
  });
});

describe('gridLayout', () => {
  it('should split 1920x1080 into four 960x540 cells without padding', () => {
    expect(gridLayout(4, FRAME, ZERO_PADDING_SETTINGS)).toEqual([
      { x: 0, y: 0, width: 960, height: 540 },
      { x: 960, y: 0, width: 960, height: 540 },
      { x: 0, y: 540, width: 960, height: 540 },
      { x: 960, y: 540, width: 960, height: 540 }
    ]);
  });

  it('should keep padding on every side and extra clearance at the bottom', () => {
    const rects = gridLayout(4, FRAME, STANDARD_SETTINGS);

    // Area: x 10, y 10, 1900 wide, 1080 - 10 - 30 = 1040 tall
    expect(rects[0]).toEqual({ x: 10, y: 10, width: 950, height: 520 });
    expect(rects[3]).toEqual({ x: 960, y: 530, width: 950, height: 520 });
  });

  it('should fill row-major and leave trailing cells empty', () => {
    const rects = gridLayout(5, FRAME, ZERO_PADDING_SETTINGS);

    expect(rects).toHaveLength(5);
    expect(rects[2]).toEqual({ x: 1280, y: 0, width: 640, height: 540 });
    expect(rects[3]).toEqual({ x: 0, y: 540, width: 640, height: 540 });
  });

  it('should offset by the usable frame origin', () => {
    const rects = gridLayout(1, SCREEN_WITH_CHROME.usableFrame, STANDARD_SETTINGS);

    expect(rects[0]).toEqual({ x: 10, y: 35, width: 2540, height: 1305 });
  });

  it('should return nothing for zero windows', () => {
    expect(gridLayout(0, FRAME, STANDARD_SETTINGS)).toEqual([]);
  });
});

describe('horizontalLayout / verticalLayout', () => {
  it('should create equal columns in input order', () => {
    expect(horizontalLayout(3, FRAME).map(r => r.x)).toEqual([0, 640, 1280]);
  });

  it('should create equal rows from the top', () => {
    expect(verticalLayout(2, FRAME)).toEqual([
      { x: 0, y: 0, width: 1920, height: 540 },
      { x: 0, y: 540, width: 1920, height: 540 }
    ]);
  });
});

describe('cascadeLayout', () => {
  it('should cap the window size and step by 30', () => {
    const rects = cascadeLayout(3, FRAME);

    // min(0.7 * 1920, 1000) x min(0.7 * 1080, 700)
    expect(rects[0]).toEqual({ x: 0, y: 0, width: 1000, height: 700 });
    expect(rects[2]).toEqual({ x: 60, y: 60, width: 1000, height: 700 });
  });

  it('should use 70% of a small frame', () => {
    const [rect] = cascadeLayout(1, SCREEN_1_1.usableFrame);

    expect(rect.width).toBeCloseTo(840, 6);
    expect(rect.height).toBe(700);
  });
});

describe('master-stack layouts', () => {
  it('should give a single focus window 70% of the width at the left edge', () => {
    const [rect] = focusLayout(1, FRAME);

    expect(rect.x).toBe(0);
    expect(rect.y).toBe(0);
    expect(rect.width).toBeCloseTo(1344, 6);
    expect(rect.height).toBe(1080);
  });

  it('should split focus into a 2/3 main column and a stacked side column', () => {
    const rects = focusLayout(3, FRAME);

    expect(rects[0].width).toBeCloseTo(1280, 6);
    expect(rects[0].height).toBe(1080);
    expect(rects[1]).toMatchObject({ y: 0, height: 540 });
    expect(rects[2]).toMatchObject({ y: 540, height: 540 });
    expect(rects[1].x).toBeCloseTo(1280, 6);
    expect(rects[1].width).toBeCloseTo(640, 6);
  });

  it('should use the golden ratio for fibonacci', () => {
    const rects = fibonacciLayout(2, FRAME);

    expect(rects[0].width).toBeCloseTo(1186.625, 2);
    expect(rects[1].x + rects[1].width).toBeCloseTo(1920, 6);
    expect(rects[1].height).toBe(1080);
  });

  it('should return nothing for zero windows', () => {
    expect(fibonacciLayout(0, FRAME)).toEqual([]);
    expect(focusLayout(0, FRAME)).toEqual([]);
  });
});
