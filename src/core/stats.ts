/**
 * Per-frame statistics for the on-screen readout.
 * Counters are reset at the start of every frame; nothing is averaged across
 * frames.
 */

import { RenderMode, TriangleVertices } from './types.js';
import { triangleArea } from './math/triangle.js';

export interface FrameStats {
  visible: number;
  fullyVisible: number;
  partiallyVisible: number;
  linesDrawn: number;
  /** Area of one grid triangle; 0 until a triangle qualified this frame. */
  triangleArea: number;
  mirroredPixels: number;
  centersDrawn: number;
  /** Mirrored pixels per centred triangle, truncated; 0 without centres. */
  averageMirrored: number;
}

export class StatsCollector {
  private visible = 0;
  private fullyVisible = 0;
  private partiallyVisible = 0;
  private linesDrawn = 0;
  private area = 0;
  private areaRecorded = false;
  private mirroredPixels = 0;
  private centersDrawn = 0;

  beginFrame(): void {
    this.visible = 0;
    this.fullyVisible = 0;
    this.partiallyVisible = 0;
    this.linesDrawn = 0;
    this.area = 0;
    this.areaRecorded = false;
    this.mirroredPixels = 0;
    this.centersDrawn = 0;
  }

  recordVisible(fully: boolean): void {
    this.visible++;
    if (fully) {
      this.fullyVisible++;
    } else {
      this.partiallyVisible++;
    }
  }

  /** Grid triangles are congruent, so only the first call of a frame computes. */
  recordArea(v: TriangleVertices): void {
    if (this.areaRecorded) return;
    this.area = triangleArea(v);
    this.areaRecorded = true;
  }

  recordLines(count: number): void {
    this.linesDrawn += count;
  }

  recordMirrored(count: number): void {
    this.mirroredPixels += count;
  }

  recordCenter(): void {
    this.centersDrawn++;
  }

  snapshot(): FrameStats {
    return {
      visible: this.visible,
      fullyVisible: this.fullyVisible,
      partiallyVisible: this.partiallyVisible,
      linesDrawn: this.linesDrawn,
      triangleArea: this.area,
      mirroredPixels: this.mirroredPixels,
      centersDrawn: this.centersDrawn,
      averageMirrored: this.centersDrawn > 0 ? Math.trunc(this.mirroredPixels / this.centersDrawn) : 0,
    };
  }
}

/** Overlay text lines for the given mode. */
export function formatOverlay(stats: FrameStats, mode: RenderMode): string[] {
  if (mode === 'mirror') {
    return [`A:${stats.triangleArea} #${stats.averageMirrored} T:${stats.centersDrawn}`];
  }
  return [
    `V:${stats.visible} F:${stats.fullyVisible} P:${stats.partiallyVisible}`,
    `L:${stats.linesDrawn} A:${stats.triangleArea}`,
  ];
}
