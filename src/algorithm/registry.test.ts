/**
 * Layout Mode Registry Tests
 *
 * Per-mode geometry lives in the mode tests; this file covers dispatch, mode
 * parsing, and the properties every mode must satisfy after correction.
 */

import {
  computeLayout,
  computeCorrectedLayout,
  isLayoutMode,
  isProfileMode,
  parseLayoutMode,
  UnknownLayoutModeError
} from './registry';
import { LAYOUT_MODES, MODE_DESCRIPTIONS, MODE_FAMILIES, MODE_LABELS } from './constants';
import { focusLayout } from './modes/basic';
import { contains } from '../geometry/rectangle';
import { STANDARD_SETTINGS, ZERO_PADDING_SETTINGS } from '../../test/fixtures/settings';
import { PROPERTY_SCREENS, SCREEN_16_9, SCREEN_1_1, SCREEN_9_16 } from '../../test/fixtures/screens';

describe('mode metadata', () => {
  it('should list 35 distinct modes', () => {
    expect(LAYOUT_MODES).toHaveLength(35);
    expect(new Set(LAYOUT_MODES).size).toBe(35);
  });

  it('should give every mode a family, label and description', () => {
    LAYOUT_MODES.forEach(mode => {
      expect(MODE_FAMILIES[mode]).toBeDefined();
      expect(MODE_LABELS[mode].length).toBeGreaterThan(0);
      expect(MODE_DESCRIPTIONS[mode].length).toBeGreaterThan(0);
    });
  });

  it('should count modes per family', () => {
    const counts = LAYOUT_MODES.reduce<Record<string, number>>((acc, mode) => {
      acc[MODE_FAMILIES[mode]] = (acc[MODE_FAMILIES[mode]] ?? 0) + 1;
      return acc;
    }, {});

    expect(counts).toEqual({ basic: 6, profile: 22, solver: 5, adaptive: 2 });
  });
});

describe('isLayoutMode / parseLayoutMode', () => {
  it('should recognise known modes', () => {
    expect(isLayoutMode('pivotExpansion')).toBe(true);
    expect(isLayoutMode('Grid')).toBe(false);
    expect(isLayoutMode(undefined)).toBe(false);
    expect(isProfileMode('coding')).toBe(true);
    expect(isProfileMode('grid')).toBe(false);
  });

  it('should parse a known mode', () => {
    expect(parseLayoutMode('focus')).toBe('focus');
  });

  it('should throw UnknownLayoutModeError for anything else', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => parseLayoutMode('spiral')).toThrow(UnknownLayoutModeError);
    expect(() => parseLayoutMode('spiral')).toThrow('Unknown layout mode: "spiral"');

    errorSpy.mockRestore();
  });
});

describe('computeLayout', () => {
  it('should lay out inside the usable frame', () => {
    const rects = computeLayout({ mode: 'grid', windowCount: 4, screen: SCREEN_16_9 }, ZERO_PADDING_SETTINGS);

    expect(rects.map(r => [r.x, r.y])).toEqual([[0, 0], [960, 0], [0, 540], [960, 540]]);
  });

  it('should return an empty result for zero windows in every mode', () => {
    LAYOUT_MODES.forEach(mode => {
      expect(computeLayout({ mode, windowCount: 0, screen: SCREEN_16_9 }, STANDARD_SETTINGS)).toEqual([]);
    });
  });

  it('should ignore negative and non-finite counts', () => {
    expect(computeLayout({ mode: 'grid', windowCount: -3, screen: SCREEN_16_9 }, STANDARD_SETTINGS)).toEqual([]);
    expect(computeLayout({ mode: 'grid', windowCount: NaN, screen: SCREEN_16_9 }, STANDARD_SETTINGS)).toEqual([]);
  });

  it('should truncate fractional counts', () => {
    expect(computeLayout({ mode: 'horizontal', windowCount: 2.7, screen: SCREEN_16_9 }, STANDARD_SETTINGS))
      .toHaveLength(2);
  });

  it('should be deterministic', () => {
    const request = { mode: 'iterativeProjection' as const, windowCount: 7, screen: SCREEN_16_9 };

    expect(computeLayout(request, STANDARD_SETTINGS)).toEqual(computeLayout(request, STANDARD_SETTINGS));
  });

  it('should match focus for ultrawide-aware profiles below the aspect threshold', () => {
    const aware = ['ultrawide', 'trading', 'monitoring'] as const;

    [SCREEN_16_9, SCREEN_9_16, SCREEN_1_1].forEach(screen => {
      aware.forEach(mode => {
        expect(computeLayout({ mode, windowCount: 4, screen }, STANDARD_SETTINGS))
          .toEqual(focusLayout(4, screen.usableFrame));
      });
    });
  });
});

describe('computeCorrectedLayout', () => {
  describe.each(PROPERTY_SCREENS)('on a %s screen', (_name, screen) => {
    it('should contain every frame and respect the minimum size for all modes and counts', () => {
      const bounds = screen.usableFrame;

      LAYOUT_MODES.forEach(mode => {
        for (let count = 0; count <= 50; count++) {
          const { frames } = computeCorrectedLayout({ mode, windowCount: count, screen }, STANDARD_SETTINGS);

          expect(frames).toHaveLength(count);
          frames.forEach(frame => {
            expect(contains(bounds, frame)).toBe(true);
            expect(frame.width).toBeGreaterThanOrEqual(STANDARD_SETTINGS.minWindowWidth - 1e-6);
            expect(frame.height).toBeGreaterThanOrEqual(STANDARD_SETTINGS.minWindowHeight - 1e-6);
          });
        }
      });
    });
  });

  it('should report cascade windows pushed back on screen', () => {
    const { frames, correctedIndices } = computeCorrectedLayout(
      { mode: 'cascade', windowCount: 20, screen: SCREEN_16_9 },
      STANDARD_SETTINGS
    );

    // Window 13 starts at y 390; 390 + 700 passes the 1080 bottom edge
    expect(correctedIndices[0]).toBe(13);
    expect(frames[13]).toEqual({ x: 390, y: 380, width: 1000, height: 700 });
  });
});
