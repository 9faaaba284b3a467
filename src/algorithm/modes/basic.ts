/**
 * Basic layout modes
 * Grid, strips, cascade and the two master-stack variants
 */

import { Rect } from '../../types/geometry';
import { subdivideHorizontally, subdivideVertically } from '../../geometry/rectangle';
import { LayoutSettings } from '../types';
import {
  GRID_BOTTOM_PADDING_FACTOR,
  CASCADE_WIDTH_FRACTION,
  CASCADE_HEIGHT_FRACTION,
  CASCADE_MAX_WIDTH,
  CASCADE_MAX_HEIGHT,
  CASCADE_STEP,
  GOLDEN_RATIO_INVERSE,
  FOCUS_MAIN_RATIO,
  MASTER_SINGLE_RATIO
} from '../constants';
import { Logger } from '../utils/logger';

/**
 * Columns and rows of the near-square grid used for `count` windows
 */
export function gridDimensions(count: number): { columns: number; rows: number } {
  if (count <= 0) return { columns: 0, rows: 0 };
  const columns = Math.ceil(Math.sqrt(count));
  return { columns, rows: Math.ceil(count / columns) };
}

/**
 * Equal cells, row-major from the top-left.
 * The frame is inset by the padding on every side, with extra clearance at the bottom.
 */
export function gridLayout(count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  if (count <= 0) return [];

  const { columns, rows } = gridDimensions(count);
  const padding = settings.gridPadding;
  const bottom = padding + padding * GRID_BOTTOM_PADDING_FACTOR;
  const area: Rect = {
    x: frame.x + padding,
    y: frame.y + padding,
    width: Math.max(0, frame.width - padding * 2),
    height: Math.max(0, frame.height - padding - bottom)
  };
  const cellWidth = area.width / columns;
  const cellHeight = area.height / rows;

  Logger.debug(`Grid: ${columns}x${rows}, cell ${cellWidth.toFixed(1)} x ${cellHeight.toFixed(1)}`);

  const result: Rect[] = [];
  for (let i = 0; i < count; i++) {
    const column = i % columns;
    const row = Math.floor(i / columns);
    result.push({
      x: area.x + column * cellWidth,
      y: area.y + row * cellHeight,
      width: cellWidth,
      height: cellHeight
    });
  }
  return result;
}

export function horizontalLayout(count: number, frame: Rect): Rect[] {
  return subdivideHorizontally(frame, count);
}

export function verticalLayout(count: number, frame: Rect): Rect[] {
  return subdivideVertically(frame, count);
}

/**
 * Same-size windows stepped down and to the right. Later windows may leave the
 * frame; the corrector pulls them back.
 */
export function cascadeLayout(count: number, frame: Rect): Rect[] {
  const width = Math.min(frame.width * CASCADE_WIDTH_FRACTION, CASCADE_MAX_WIDTH);
  const height = Math.min(frame.height * CASCADE_HEIGHT_FRACTION, CASCADE_MAX_HEIGHT);

  const result: Rect[] = [];
  for (let i = 0; i < count; i++) {
    result.push({
      x: frame.x + CASCADE_STEP * i,
      y: frame.y + CASCADE_STEP * i,
      width,
      height
    });
  }
  return result;
}

/**
 * Main column on the left taking `ratio` of the width, remaining windows
 * stacked in equal rows on the right
 */
export function masterStackLayout(count: number, frame: Rect, ratio: number): Rect[] {
  if (count <= 0) return [];
  if (count === 1) {
    return [{ x: frame.x, y: frame.y, width: frame.width * MASTER_SINGLE_RATIO, height: frame.height }];
  }

  const mainWidth = frame.width * ratio;
  const main: Rect = { x: frame.x, y: frame.y, width: mainWidth, height: frame.height };
  const stack: Rect = {
    x: frame.x + mainWidth,
    y: frame.y,
    width: frame.width - mainWidth,
    height: frame.height
  };

  return [main, ...subdivideVertically(stack, count - 1)];
}

export function fibonacciLayout(count: number, frame: Rect): Rect[] {
  return masterStackLayout(count, frame, GOLDEN_RATIO_INVERSE);
}

export function focusLayout(count: number, frame: Rect): Rect[] {
  return masterStackLayout(count, frame, FOCUS_MAIN_RATIO);
}
