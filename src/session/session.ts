/**
 * Interactive session: the pull-based main loop.
 *
 * Acquires the sample buffer and drawing surface, paints the first frame,
 * then polls the input source on a fixed tick. Every event that changes
 * user-visible state is followed by exactly one synchronous frame before the
 * next poll. The config and sample buffer belong to this loop alone.
 */

import {
  Canvas,
  EXIT_OK,
  EXIT_RESOURCE_FAILURE,
  InputSource,
  RenderConfig,
  SCREEN_VIEWPORT,
  ViewHost,
  Viewport,
} from '../core/types.js';
import { ResourceAcquisitionError } from '../errors.js';
import { RandomSource, SeededRNG, mathRandomSource } from '../core/rng.js';
import { SampleBuffer } from '../core/sample_buffer.js';
import { PatternSampler } from '../core/pattern_sampler.js';
import { FrameStats } from '../core/stats.js';
import { GridRenderer } from '../impl_reference/grid_renderer.js';
import { createInteractionController } from '../controller/interaction_controller.js';
import { SessionOptionsInput, renderConfigFromOptions, resolveSessionOptions } from './options.js';

const LOG_TAG = '[tri-grid]';

export interface SessionDeps {
  host: ViewHost;
  input: InputSource;
  options?: SessionOptionsInput;
  /** Overrides the seed/Math.random choice made from the options. */
  rng?: RandomSource;
  viewport?: Viewport;
  /** Optional hook: called after every painted frame. */
  onFrame?: (stats: FrameStats, config: Readonly<RenderConfig>) => void;
}

/**
 * Run a session to completion. Resolves with the exit status: EXIT_OK after
 * Back, EXIT_RESOURCE_FAILURE when startup could not acquire its resources.
 * Invalid options throw SessionOptionsError before anything is acquired.
 */
export async function runSession(deps: SessionDeps): Promise<number> {
  const opts = resolveSessionOptions(deps.options ?? {});
  const viewport = deps.viewport ?? SCREEN_VIEWPORT;
  const config = renderConfigFromOptions(opts);

  let buffer: SampleBuffer;
  let canvas: Canvas;
  try {
    buffer = new SampleBuffer(opts.maxPixels);
    canvas = acquireCanvas(deps.host, viewport);
  } catch (err) {
    if (err instanceof ResourceAcquisitionError) {
      console.error(`${LOG_TAG} startup failed: ${err.message}`);
      return EXIT_RESOURCE_FAILURE;
    }
    throw err;
  }

  try {
    const rng = deps.rng ?? (opts.seed !== undefined ? new SeededRNG(opts.seed) : mathRandomSource);
    const sampler = new PatternSampler(buffer, rng, viewport, config.sideLength);
    const renderer = new GridRenderer(viewport, sampler);
    const controller = createInteractionController(config);

    const paint = (): void => {
      const stats = renderer.render(canvas, config);
      deps.host.present(canvas);
      deps.onFrame?.(stats, config);
    };

    sampler.regenerate(config);
    console.log(`${LOG_TAG} ${config.mode} mode, side ${config.sideLength}, ${config.numRandomPixels} random pixels`);
    paint();

    while (config.running) {
      const event = await deps.input.poll(opts.pollTimeoutMs);
      if (!event) continue;

      const outcome = controller.handle(event);
      if (outcome.geometryDirty) {
        sampler.regenerate(config);
      }
      if (outcome.redraw) {
        paint();
      }
    }

    console.log(`${LOG_TAG} session ended`);
  } finally {
    deps.host.close();
  }

  return EXIT_OK;
}

function acquireCanvas(host: ViewHost, viewport: Viewport): Canvas {
  const canvas = host.open();
  if (!canvas) {
    throw new ResourceAcquisitionError('display surface unavailable');
  }
  if (canvas.width < viewport.width || canvas.height < viewport.height) {
    host.close();
    throw new ResourceAcquisitionError(
      `display surface ${canvas.width}x${canvas.height} is smaller than the ${viewport.width}x${viewport.height} viewport`
    );
  }
  return canvas;
}
