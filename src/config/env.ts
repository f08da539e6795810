/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';
import type { StationRef } from '../types.ts';

/** Parse "6:FURNAS,74:GBM" → [{ id: '6', name: 'FURNAS' }, { id: '74', name: 'GBM' }], order kept */
export const StationMapSchema = z.string()
  .transform((raw, ctx) => {
    const stations: StationRef[] = [];
    for (const part of raw.split(',').map(s => s.trim()).filter(Boolean)) {
      const [id, name, ...rest] = part.split(':').map(s => s.trim());
      if (!id || !name || rest.length > 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid station entry "${part}" (expected id:NAME)` });
        return z.NEVER;
      }
      if (stations.some(s => s.id === id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate station id "${id}"` });
        return z.NEVER;
      }
      stations.push({ id, name });
    }
    if (stations.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one reference station is required' });
      return z.NEVER;
    }
    return stations;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ── Analog selection ──
  REFERENCE_STATIONS: StationMapSchema.default('6:FURNAS,74:GBM,169:SOBRADINHO,275:TUCURUI'),
  MAX_ABOVE_MAX: z.coerce.number().int().min(0).default(80),
  MAX_BELOW_MIN: z.coerce.number().int().min(0).default(80),

  // ── Output ──
  OUTPUT_DIR_NAME: z.string().min(1).default('extended'),
  REPORT_FILE_NAME: z.string().min(1).default('extension-report.txt'),
  METRICS_FILE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
