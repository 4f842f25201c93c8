import { describe, expect, it, vi } from 'vitest';
import { createInteractionController } from '../src/controller/interaction_controller.js';
import { createRenderConfig } from '../src/core/types.js';
import { long, press, repeat } from './support/fakes.js';

describe('createInteractionController', () => {
  it('grows the side length by two per Up press', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    for (let i = 0; i < 10; i++) {
      expect(controller.handle(press('up'))).toEqual({ redraw: true, geometryDirty: true });
    }
    expect(config.sideLength).toBe(25);
  });

  it('saturates at the maximum side length', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    const outcomes = Array.from({ length: 30 }, () => controller.handle(press('up')));
    expect(config.sideLength).toBe(63);
    expect(outcomes[28]).toEqual({ redraw: true, geometryDirty: true });
    expect(outcomes[29]).toEqual({ redraw: false, geometryDirty: false });
  });

  it('clamps an even outline side length onto the maximum', () => {
    const config = { ...createRenderConfig('outline'), sideLength: 62 };
    const controller = createInteractionController(config);

    controller.handle(press('up'));
    expect(config.sideLength).toBe(63);
  });

  it('does not shrink below the mode minimum', () => {
    const mirror = createRenderConfig('mirror');
    expect(createInteractionController(mirror).handle(press('down'))).toEqual({ redraw: false, geometryDirty: false });
    expect(mirror.sideLength).toBe(5);

    const outline = { ...createRenderConfig('outline'), sideLength: 11 };
    createInteractionController(outline).handle(press('down'));
    expect(outline.sideLength).toBe(10);
  });

  it('adjusts the pixel count and never goes negative', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    expect(controller.handle(press('left')).redraw).toBe(false);
    controller.handle(press('right'));
    controller.handle(repeat('right'));
    controller.handle(repeat('right'));
    expect(config.numRandomPixels).toBe(3);

    controller.handle(press('left'));
    expect(config.numRandomPixels).toBe(2);
  });

  it('ignores long presses of the directional keys', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    expect(controller.handle(long('up'))).toEqual({ redraw: false, geometryDirty: false });
    expect(controller.handle(long('right'))).toEqual({ redraw: false, geometryDirty: false });
    expect(config).toEqual(createRenderConfig('mirror'));
  });

  it('toggles centres with Ok in mirror mode without dirtying geometry', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    expect(controller.handle(press('ok'))).toEqual({ redraw: true, geometryDirty: false });
    expect(config.showCenters).toBe(true);
    expect(config.showInfo).toBe(true);
  });

  it('toggles the readout with Ok in outline mode', () => {
    const config = createRenderConfig('outline');
    const controller = createInteractionController(config);

    controller.handle(press('ok'));
    expect(config.showInfo).toBe(false);
    expect(config.showCenters).toBe(false);
  });

  it('toggles lines with a long Ok and ignores Ok repeats', () => {
    const config = createRenderConfig('outline');
    const controller = createInteractionController(config);

    controller.handle(long('ok'));
    expect(config.showLines).toBe(false);
    expect(controller.handle(repeat('ok'))).toEqual({ redraw: false, geometryDirty: false });
    controller.handle(long('ok'));
    expect(config.showLines).toBe(true);
  });

  it('stops on Back and ignores everything after', () => {
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config);

    expect(controller.state).toBe('running');
    expect(controller.handle(press('back'))).toEqual({ redraw: false, geometryDirty: false });
    expect(config.running).toBe(false);
    expect(controller.state).toBe('stopped');

    controller.handle(press('up'));
    expect(config.sideLength).toBe(5);
  });

  it('honours custom limits', () => {
    const config = { ...createRenderConfig('mirror'), sideLength: 20 };
    const controller = createInteractionController(config, { limits: { min: 18, max: 24, step: 3 } });

    controller.handle(press('up'));
    controller.handle(press('up'));
    expect(config.sideLength).toBe(24);
    controller.handle(press('down'));
    controller.handle(press('down'));
    controller.handle(press('down'));
    expect(config.sideLength).toBe(18);
  });

  it('reports only the changes that need a redraw', () => {
    const onChange = vi.fn();
    const config = createRenderConfig('mirror');
    const controller = createInteractionController(config, { onChange });

    controller.handle(press('down'));
    controller.handle(press('up'));
    controller.handle(press('ok'));
    controller.handle(press('back'));

    expect(onChange).toHaveBeenCalledTimes(2);
    expect(onChange.mock.calls[0][1]).toEqual({ redraw: true, geometryDirty: true });
    expect(onChange.mock.calls[1][1]).toEqual({ redraw: true, geometryDirty: false });
  });
});
