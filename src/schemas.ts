// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for the pipeline and the CLI
// ═══════════════════════════════════════════════════════
import { z } from 'zod';

const Threshold = z.number().int().min(0);

// ── selectAnalog / fit ──

export const FitParamsSchema = z.object({
  station: z.string().min(1),
  maxAboveMax: Threshold.default(80),
  maxBelowMin: Threshold.default(80),
  excludedYears: z.array(z.number().int()).default([]),
});

export type FitParamsInput = z.input<typeof FitParamsSchema>;
export type FitParams = z.infer<typeof FitParamsSchema>;

// ── selectByRank ──

export const RankParamsSchema = z.object({
  station: z.string().min(1),
  position: z.number().int().min(0).default(1),
});

export type RankParamsInput = z.input<typeof RankParamsSchema>;

// ── CLI: analog-extend <folder> [--max N] [--max-above N] [--max-below N] ──

const CliThreshold = z.coerce.number().int().min(0);

export const CliArgsSchema = z.object({
  folder: z.string().min(1, 'Input folder is required'),
  max: CliThreshold.optional(),
  maxAbove: CliThreshold.optional(),
  maxBelow: CliThreshold.optional(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;
