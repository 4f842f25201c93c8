import type { InputEvent, RenderConfig, SideLimits } from '../core/types.js';
import { sideLimitsFor } from '../core/types.js';

export interface InputOutcome {
  /** User-visible state changed; one frame must be painted before the next poll. */
  redraw: boolean;
  /** Side length or sample count changed; the sample buffer must be regenerated first. */
  geometryDirty: boolean;
}

export interface InteractionController {
  /** Apply one input event to the config. */
  handle(event: InputEvent): InputOutcome;

  readonly state: 'running' | 'stopped';
}

export interface InteractionControllerOptions {
  /** Side-length bounds. Default: the limits of the config's mode. */
  limits?: SideLimits;

  /** Optional hook: called after every event that changed user-visible state. */
  onChange?: (config: Readonly<RenderConfig>, outcome: InputOutcome) => void;
}

const NO_CHANGE: InputOutcome = { redraw: false, geometryDirty: false };
const DISPLAY_CHANGE: InputOutcome = { redraw: true, geometryDirty: false };
const GEOMETRY_CHANGE: InputOutcome = { redraw: true, geometryDirty: true };

export function createInteractionController(
  config: RenderConfig,
  opts: InteractionControllerOptions = {}
): InteractionController {
  const limits = opts.limits ?? sideLimitsFor(config.mode);

  const apply = (event: InputEvent): InputOutcome => {
    // Held directional keys auto-repeat; long presses only mean something on Ok.
    const adjusting = event.kind === 'press' || event.kind === 'repeat';

    switch (event.key) {
      case 'up':
        if (!adjusting || config.sideLength >= limits.max) return NO_CHANGE;
        config.sideLength = Math.min(config.sideLength + limits.step, limits.max);
        return GEOMETRY_CHANGE;

      case 'down':
        if (!adjusting || config.sideLength <= limits.min) return NO_CHANGE;
        config.sideLength = Math.max(config.sideLength - limits.step, limits.min);
        return GEOMETRY_CHANGE;

      case 'left':
        if (!adjusting || config.numRandomPixels <= 0) return NO_CHANGE;
        config.numRandomPixels--;
        return GEOMETRY_CHANGE;

      case 'right':
        if (!adjusting) return NO_CHANGE;
        config.numRandomPixels++;
        return GEOMETRY_CHANGE;

      case 'ok':
        if (event.kind === 'press') {
          if (config.mode === 'mirror') {
            config.showCenters = !config.showCenters;
          } else {
            config.showInfo = !config.showInfo;
          }
          return DISPLAY_CHANGE;
        }
        if (event.kind === 'long') {
          config.showLines = !config.showLines;
          return DISPLAY_CHANGE;
        }
        return NO_CHANGE;

      case 'back':
        config.running = false;
        return NO_CHANGE;
    }
  };

  return {
    handle(event: InputEvent): InputOutcome {
      if (!config.running) return NO_CHANGE;

      const outcome = apply(event);
      if (outcome.redraw) {
        opts.onChange?.(config, outcome);
      }
      return outcome;
    },

    get state(): 'running' | 'stopped' {
      return config.running ? 'running' : 'stopped';
    },
  };
}
