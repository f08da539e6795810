// ═══════════════════════════════════════════════════════
// selector.ts — Analog year selection
//
// Walks the ranked candidate windows (rank 0, the reference window itself,
// is skipped) and accepts the first one whose implied first forecast month
// stays within the historical amplitude bounds on enough stations and whose
// year has not been used yet.
//
//   SEARCHING ──accept──▶ ACCEPTED
//       │
//       └──ranking exhausted──▶ EXHAUSTED (NoAcceptableAnalogError)
// ═══════════════════════════════════════════════════════
import { computeAmplitudeBounds } from './amplitude.ts';
import { computeCorrelationTable } from './correlation.ts';
import { NoAcceptableAnalogError } from './errors.ts';
import { addMonths, formatPeriod } from './period.ts';
import { rankCandidates } from './ranker.ts';
import { indexOf, rowRecord } from './series.ts';
import { FitParamsSchema, RankParamsSchema, type FitParams, type FitParamsInput, type RankParamsInput } from '../schemas.ts';
import type {
  AmplitudeBounds, CorrelationTable, MonthlySeries, RankedCandidate,
  RejectionReason, RejectionRecord, SelectionResult, StationValues,
} from '../types.ts';

interface SelectionContext {
  series: MonthlySeries;
  params: FitParams;
  table: CorrelationTable;
  ranked: RankedCandidate[];
  bounds: AmplitudeBounds;
  excluded: ReadonlySet<number>;
}

type SelectorState =
  | { kind: 'SEARCHING'; rank: number; rejections: RejectionRecord[] }
  | { kind: 'ACCEPTED'; result: SelectionResult }
  | { kind: 'EXHAUSTED'; rejections: RejectionRecord[] };

export interface CandidateCheck {
  year: number;
  ratios: StationValues;
  aboveCount: number;
  belowCount: number;
  reason: RejectionReason | null;
}

/**
 * Ratio of the month after the candidate window to the series' last month,
 * per station. This is the jump the forecast would start with.
 */
export function candidateRatios(series: MonthlySeries, candidate: RankedCandidate): StationValues {
  const following = rowRecord(series, indexOf(series, addMonths(candidate.windowEnd, 1)));
  const last = rowRecord(series, series.rows.length - 1);
  const ratios: Record<string, number> = {};
  for (const c of series.columns) ratios[c] = (following[c] ?? NaN) / (last[c] ?? NaN);
  return ratios;
}

/** Amplitude and year checks for one candidate, in rejection-priority order. */
export function checkCandidate(
  series: MonthlySeries,
  candidate: RankedCandidate,
  bounds: AmplitudeBounds,
  params: Pick<FitParams, 'maxAboveMax' | 'maxBelowMin'>,
  excluded: ReadonlySet<number>,
): CandidateCheck {
  const year = addMonths(candidate.windowEnd, 1).year;
  const ratios = candidateRatios(series, candidate);

  let aboveCount = 0, belowCount = 0;
  for (const [station, b] of Object.entries(bounds)) {
    const r = ratios[station] ?? NaN;
    if (r > b.max) aboveCount++;
    if (r < b.min) belowCount++;
  }

  let reason: RejectionReason | null = null;
  if (aboveCount > params.maxAboveMax) reason = 'AmplitudeAboveMax';
  else if (belowCount > params.maxBelowMin) reason = 'AmplitudeBelowMin';
  else if (excluded.has(year)) reason = 'YearAlreadyUsed';

  return { year, ratios, aboveCount, belowCount, reason };
}

function rejectionOf(candidate: RankedCandidate, check: CandidateCheck, params: FitParams): RejectionRecord {
  const base = { year: check.year, windowEnd: { ...candidate.windowEnd }, correlation: candidate.correlation };
  switch (check.reason) {
    case 'AmplitudeAboveMax':
      return { ...base, reason: 'AmplitudeAboveMax', count: check.aboveCount, limit: params.maxAboveMax };
    case 'AmplitudeBelowMin':
      return { ...base, reason: 'AmplitudeBelowMin', count: check.belowCount, limit: params.maxBelowMin };
    default:
      return { ...base, reason: 'YearAlreadyUsed' };
  }
}

function buildResult(
  ctx: Pick<SelectionContext, 'table'> & { station: string; bounds: AmplitudeBounds | null },
  candidate: RankedCandidate,
  check: Pick<CandidateCheck, 'year' | 'ratios' | 'aboveCount' | 'belowCount'>,
  rejections: readonly RejectionRecord[],
): SelectionResult {
  const row = ctx.table.find(r => formatPeriod(r.windowEnd) === formatPeriod(candidate.windowEnd));
  return {
    rank: candidate.rank,
    windowEnd: { ...candidate.windowEnd },
    forecastStart: addMonths(candidate.windowEnd, 1),
    year: check.year,
    station: ctx.station,
    correlation: candidate.correlation,
    correlations: { ...(row?.values ?? {}) },
    aboveCount: check.aboveCount,
    belowCount: check.belowCount,
    candidateRatios: check.ratios,
    bounds: ctx.bounds,
    rejections,
    correlationTable: ctx.table,
  };
}

function advance(state: SelectorState, ctx: SelectionContext): SelectorState {
  if (state.kind !== 'SEARCHING') return state;

  const candidate = ctx.ranked[state.rank];
  if (!candidate) return { kind: 'EXHAUSTED', rejections: state.rejections };

  const check = checkCandidate(ctx.series, candidate, ctx.bounds, ctx.params, ctx.excluded);
  if (check.reason) {
    return {
      kind: 'SEARCHING',
      rank: state.rank + 1,
      rejections: [...state.rejections, rejectionOf(candidate, check, ctx.params)],
    };
  }

  return {
    kind: 'ACCEPTED',
    result: buildResult({ table: ctx.table, station: ctx.params.station, bounds: ctx.bounds }, candidate, check, state.rejections),
  };
}

/**
 * Select the analog year for a series.
 * Throws NoAcceptableAnalogError (carrying every rejection) when no candidate passes.
 */
export function selectAnalog(series: MonthlySeries, input: FitParamsInput): SelectionResult {
  const params = FitParamsSchema.parse(input);
  const table = computeCorrelationTable(series);
  const ctx: SelectionContext = {
    series,
    params,
    table,
    ranked: rankCandidates(table, params.station),
    bounds: computeAmplitudeBounds(series),
    excluded: new Set(params.excludedYears),
  };

  let state: SelectorState = { kind: 'SEARCHING', rank: 1, rejections: [] };
  while (state.kind === 'SEARCHING') state = advance(state, ctx);

  if (state.kind === 'EXHAUSTED') {
    throw new NoAcceptableAnalogError(
      `All ${state.rejections.length} candidates rejected for station "${params.station}"`,
      state.rejections,
    );
  }
  return state.result;
}

export const fit = selectAnalog;

/**
 * Fixed-rank selection: take the candidate at `position` in the ranking
 * without amplitude or year checks.
 */
export function selectByRank(series: MonthlySeries, input: RankParamsInput): SelectionResult {
  const params = RankParamsSchema.parse(input);
  const table = computeCorrelationTable(series);
  const ranked = rankCandidates(table, params.station);

  const candidate = params.position > 0 ? ranked[params.position] : undefined;
  if (!candidate) {
    throw new NoAcceptableAnalogError(
      `No candidate at position ${params.position} (ranking has ${ranked.length - 1} historical windows)`,
      [],
    );
  }

  const check = {
    year: addMonths(candidate.windowEnd, 1).year,
    ratios: candidateRatios(series, candidate),
    aboveCount: 0,
    belowCount: 0,
  };
  return buildResult({ table, station: params.station, bounds: null }, candidate, check, []);
}
