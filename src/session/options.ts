/**
 * Session options: what a front end may configure before the loop starts.
 */

import { z } from 'zod';
import { SessionOptionsError } from '../errors.js';
import { MAX_PIXELS, POLL_TIMEOUT_MS, RenderConfig, sideLimitsFor } from '../core/types.js';

export const sessionOptionsSchema = z
  .object({
    mode: z.enum(['mirror', 'outline']).default('mirror'),
    /** Defaults to the mode's minimum side length. */
    sideLength: z.number().int().optional(),
    numRandomPixels: z.number().int().nonnegative().default(0),
    showCenters: z.boolean().default(false),
    showInfo: z.boolean().default(true),
    showLines: z.boolean().default(true),
    /** Seed for reproducible patterns; unseeded sessions use Math.random. */
    seed: z.number().int().nonnegative().max(0xffffffff).optional(),
    /** Sample buffer capacity; never above MAX_PIXELS. */
    maxPixels: z.number().int().positive().max(MAX_PIXELS).default(MAX_PIXELS),
    pollTimeoutMs: z.number().int().positive().default(POLL_TIMEOUT_MS),
  })
  .strict()
  .superRefine((opts, ctx) => {
    if (opts.sideLength === undefined) return;
    const { min, max } = sideLimitsFor(opts.mode);
    if (opts.sideLength < min || opts.sideLength > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sideLength'],
        message: `must be within [${min}, ${max}] in ${opts.mode} mode`,
      });
    }
  });

export type SessionOptionsInput = z.input<typeof sessionOptionsSchema>;

export type SessionOptions = Omit<z.output<typeof sessionOptionsSchema>, 'sideLength'> & {
  sideLength: number;
};

/** Validate and default raw options. Throws SessionOptionsError. */
export function resolveSessionOptions(input: unknown = {}): SessionOptions {
  const parsed = sessionOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new SessionOptionsError('invalid session options', issues);
  }

  const opts = parsed.data;
  return {
    ...opts,
    sideLength: opts.sideLength ?? sideLimitsFor(opts.mode).min,
  };
}

export function renderConfigFromOptions(opts: SessionOptions): RenderConfig {
  return {
    mode: opts.mode,
    sideLength: opts.sideLength,
    numRandomPixels: opts.numRandomPixels,
    showCenters: opts.showCenters,
    showInfo: opts.showInfo,
    showLines: opts.showLines,
    running: true,
  };
}
