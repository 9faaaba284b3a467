/**
 * Test Fixtures - In-memory window system
 *
 * A source and sink backed by a Map, with jest.fn wrappers so tests can
 * inspect calls. The sink stores whatever frame it accepts.
 */

import { Rect } from '../../src/types/geometry';
import { ArrangeContext, WindowSink, WindowSource } from '../../src/orchestrator/types';
import { STANDARD_SETTINGS } from './settings';

export interface FakeWindowSystem {
  frames: Map<string, Rect>;
  source: WindowSource<string> & {
    listWindows: jest.Mock<string[], []>;
    currentFrame: jest.Mock<Rect | undefined, [string]>;
  };
  sink: WindowSink<string> & {
    setFrame: jest.Mock<boolean, [string, Rect]>;
  };
  context: ArrangeContext<string>;
}

export function createFakeWindowSystem(initial: Record<string, Rect | undefined> = {}): FakeWindowSystem {
  const frames = new Map<string, Rect>();
  Object.entries(initial).forEach(([handle, frame]) => {
    if (frame) frames.set(handle, frame);
  });
  const handles = Object.keys(initial);

  const source = {
    listWindows: jest.fn<string[], []>(() => [...handles]),
    currentFrame: jest.fn<Rect | undefined, [string]>(handle => frames.get(handle))
  };
  const sink = {
    setFrame: jest.fn<boolean, [string, Rect]>((handle, frame) => {
      frames.set(handle, frame);
      return true;
    })
  };

  return { frames, source, sink, context: { source, sink, settings: STANDARD_SETTINGS } };
}
