/**
 * Grid Renderer
 *
 * Paints one complete frame: enumerates the grid, culls hidden triangles,
 * hands each visible one to the mode's drawing step and feeds the per-frame
 * statistics that end up in the overlay.
 */

import { Canvas, RenderConfig, TriangleVertices, Viewport } from '../core/types.js';
import { triangleCentroid } from '../core/math/triangle.js';
import { enumerateCells, gridExtent, isTriangleFullyVisible, isTriangleVisible } from '../core/visibility.js';
import { PatternSampler } from '../core/pattern_sampler.js';
import { drawDashedOutline, drawSolidEdges, ownedDiagonals, seamEdges } from '../core/lines.js';
import { FrameStats, StatsCollector, formatOverlay } from '../core/stats.js';

const OVERLAY_WIDTH = 60;
const OVERLAY_LINE_HEIGHT = 10;
const OVERLAY_TEXT_INSET = 2;
const OVERLAY_BASELINE = 8;
const CENTER_MARKER_RADIUS = 1;

export class GridRenderer {
  private readonly stats = new StatsCollector();

  constructor(
    private readonly viewport: Viewport,
    private readonly sampler: PatternSampler
  ) {}

  render(canvas: Canvas, config: RenderConfig): FrameStats {
    canvas.clear();
    canvas.setForeground('black');
    this.stats.beginFrame();

    const solidGrid = config.mode === 'outline' && config.showLines;
    if (solidGrid) {
      const { columns } = gridExtent(config.sideLength, this.viewport);
      this.stats.recordLines(drawSolidEdges(canvas, seamEdges(columns, config.sideLength, this.viewport)));
    }

    for (const cell of enumerateCells(config.sideLength, this.viewport)) {
      const v = cell.vertices;
      if (!isTriangleVisible(v, this.viewport)) continue;

      this.stats.recordVisible(isTriangleFullyVisible(v, this.viewport));

      if (config.mode === 'mirror') {
        this.renderMirrorCell(canvas, v, config);
      } else if (solidGrid) {
        this.stats.recordArea(v);
        this.stats.recordLines(drawSolidEdges(canvas, ownedDiagonals(v, cell.pointingRight)));
      } else {
        this.stats.recordArea(v);
        this.stats.recordLines(drawDashedOutline(canvas, v));
      }
    }

    const frame = this.stats.snapshot();
    if (config.showInfo) {
      this.drawOverlay(canvas, formatOverlay(frame, config.mode));
    }
    return frame;
  }

  private renderMirrorCell(canvas: Canvas, v: TriangleVertices, config: RenderConfig): void {
    if (config.showLines) {
      this.stats.recordLines(drawDashedOutline(canvas, v));
    }

    const center = triangleCentroid(v);
    this.stats.recordMirrored(this.sampler.drawMirrored(canvas, center));

    const { width, height } = this.viewport;
    if (config.showCenters && center.x >= 0 && center.x < width && center.y >= 0 && center.y < height) {
      canvas.drawFilledDisc(center.x, center.y, CENTER_MARKER_RADIUS);
      this.stats.recordCenter();
      this.stats.recordArea(v);
    }
  }

  private drawOverlay(canvas: Canvas, lines: string[]): void {
    const left = this.viewport.width - OVERLAY_WIDTH;

    canvas.setForeground('white');
    canvas.drawFilledRect(left, 0, OVERLAY_WIDTH, OVERLAY_LINE_HEIGHT * lines.length);

    canvas.setForeground('black');
    lines.forEach((line, i) => {
      canvas.drawText(left + OVERLAY_TEXT_INSET, OVERLAY_BASELINE + i * OVERLAY_LINE_HEIGHT, line);
    });
  }
}
