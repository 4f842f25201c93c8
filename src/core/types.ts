/**
 * Core types and contracts for the triangular grid engine.
 * The geometry core, the frame renderer and both front ends (terminal and
 * browser) agree on these shapes.
 */

// ============================================================================
// Geometry Types
// ============================================================================

/** Integer screen coordinate. Copied by value, never shared. */
export interface Point {
  x: number;
  y: number;
}

/**
 * The three corners of one grid triangle, in the fixed winding order of its
 * orientation. Triangles are never stored; they are derived on demand.
 */
export type TriangleVertices = readonly [Point, Point, Point];

/** Drawable area; coordinates are valid in [0, width) x [0, height). */
export interface Viewport {
  width: number;
  height: number;
  /** Horizontal line the grid rows are mirrored around. */
  centerY: number;
}

// ============================================================================
// Render Configuration
// ============================================================================

export type RenderMode = 'mirror' | 'outline';

/**
 * Mutable session state. One instance is created at session start and is
 * threaded through the input and render paths; nothing else owns it.
 */
export interface RenderConfig {
  mode: RenderMode;
  sideLength: number;
  numRandomPixels: number;
  /** Mirror mode: draw a disc on every triangle's centroid. */
  showCenters: boolean;
  /** Outline mode: draw the statistics overlay. */
  showInfo: boolean;
  /** Draw triangle edges (dashed in mirror mode, solid grid in outline mode). */
  showLines: boolean;
  running: boolean;
}

export interface SideLimits {
  min: number;
  max: number;
  step: number;
}

// ============================================================================
// Display Contracts
// ============================================================================

/** Binary colour: black is the lit foreground, white the background. */
export type Color = 'black' | 'white';

/**
 * Pixel drawing surface. Calls take effect immediately; nothing is buffered
 * by the engine.
 */
export interface Canvas {
  readonly width: number;
  readonly height: number;
  clear(): void;
  setForeground(color: Color): void;
  drawPoint(x: number, y: number): void;
  drawLine(x0: number, y0: number, x1: number, y1: number): void;
  drawFilledDisc(x: number, y: number, radius: number): void;
  drawFilledRect(x: number, y: number, width: number, height: number): void;
  /** Draw `text` with its baseline at y. */
  drawText(x: number, y: number, text: string): void;
}

/**
 * Display manager the session registers with. `open` acquires the drawing
 * surface and returns null when it cannot.
 */
export interface ViewHost {
  open(): Canvas | null;
  /** Flush a finished frame to the physical display. */
  present(canvas: Canvas): void;
  close(): void;
}

// ============================================================================
// Input Contracts
// ============================================================================

export type InputKey = 'up' | 'down' | 'left' | 'right' | 'ok' | 'back';

export type InputKind = 'press' | 'repeat' | 'long';

export interface InputEvent {
  key: InputKey;
  kind: InputKind;
}

export interface InputSource {
  /** Wait up to `timeoutMs` for the next event; null on timeout. */
  poll(timeoutMs: number): Promise<InputEvent | null>;
}

// ============================================================================
// Constants
// ============================================================================

export const SCREEN_WIDTH = 128;
export const SCREEN_HEIGHT = 64;
export const CENTER_Y = 31;

export const MIN_SIDE_MIRROR = 5;
export const MIN_SIDE_OUTLINE = 10;
export const MAX_SIDE = 63;
export const SIDE_STEP = 2;

/** Capacity of the sample buffer. */
export const MAX_PIXELS = 200;

export const POLL_TIMEOUT_MS = 100;

export const EXIT_OK = 0;
export const EXIT_RESOURCE_FAILURE = 1;

export const SCREEN_VIEWPORT: Viewport = {
  width: SCREEN_WIDTH,
  height: SCREEN_HEIGHT,
  centerY: CENTER_Y,
};

export function sideLimitsFor(mode: RenderMode): SideLimits {
  return {
    min: mode === 'mirror' ? MIN_SIDE_MIRROR : MIN_SIDE_OUTLINE,
    max: MAX_SIDE,
    step: SIDE_STEP,
  };
}

export function createRenderConfig(mode: RenderMode = 'mirror'): RenderConfig {
  return {
    mode,
    sideLength: sideLimitsFor(mode).min,
    numRandomPixels: 0,
    showCenters: false,
    showInfo: true,
    showLines: true,
    running: true,
  };
}
