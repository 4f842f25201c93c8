export type {
  Point,
  TriangleVertices,
  Viewport,
  RenderMode,
  RenderConfig,
  SideLimits,
  Color,
  Canvas,
  ViewHost,
  InputKey,
  InputKind,
  InputEvent,
  InputSource,
} from './core/types.js';

export {
  SCREEN_WIDTH,
  SCREEN_HEIGHT,
  CENTER_Y,
  MIN_SIDE_MIRROR,
  MIN_SIDE_OUTLINE,
  MAX_SIDE,
  SIDE_STEP,
  MAX_PIXELS,
  POLL_TIMEOUT_MS,
  EXIT_OK,
  EXIT_RESOURCE_FAILURE,
  SCREEN_VIEWPORT,
  sideLimitsFor,
  createRenderConfig,
} from './core/types.js';

export {
  triangleHeight,
  isPointingRight,
  triangleVertices,
  referenceTriangle,
  triangleCentroid,
  triangleArea,
} from './core/math/triangle.js';

export { pointInTriangle } from './core/selection/point_in_triangle.js';

export {
  isTriangleVisible,
  isTriangleFullyVisible,
  classifyVisibility,
  gridExtent,
  enumerateCells,
  type Visibility,
  type GridExtent,
  type GridCell,
} from './core/visibility.js';

export { SeededRNG, mathRandomSource, type RandomSource } from './core/rng.js';
export { SampleBuffer } from './core/sample_buffer.js';
export { PatternSampler, type SampleResult } from './core/pattern_sampler.js';

export {
  DASH_DOT_PATTERN,
  walkLine,
  drawPatternedLine,
  drawDashedOutline,
  triangleEdges,
  ownedDiagonals,
  seamEdges,
  drawSolidEdges,
  type Edge,
} from './core/lines.js';

export { StatsCollector, formatOverlay, type FrameStats } from './core/stats.js';
export { BitmapCanvas, type TextRun } from './core/bitmap_canvas.js';
export { GridRenderer } from './impl_reference/grid_renderer.js';

export {
  createInteractionController,
  type InteractionController,
  type InteractionControllerOptions,
  type InputOutcome,
} from './controller/interaction_controller.js';

export { QueuedInputSource } from './controller/input_queue.js';
export { KeyClassifier } from './controller/key_classifier.js';

export {
  sessionOptionsSchema,
  resolveSessionOptions,
  renderConfigFromOptions,
  type SessionOptions,
  type SessionOptionsInput,
} from './session/options.js';

export { runSession, type SessionDeps } from './session/session.js';
export { ResourceAcquisitionError, SessionOptionsError } from './errors.js';
