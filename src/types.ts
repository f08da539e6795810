// ═══════════════════════════════════════════════════════
// Analog Extension — Core Type Definitions
// Every data shape shared by the selection pipeline and the batch driver.
// ═══════════════════════════════════════════════════════

// ── Time index ──

export interface MonthPeriod {
  year: number;
  month: number;   // 1..12
}

// ── Series ──

/**
 * Monthly series: row i holds the values of month `start + i`, one per column.
 * Missing values are NaN.
 */
export interface MonthlySeries {
  readonly start: MonthPeriod;
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly number[]>;
}

export interface SeriesEntry {
  period: MonthPeriod;
  values: readonly number[];
}

/** Reference station: series column id plus the display name used in output file names */
export interface StationRef {
  id: string;
  name: string;
}

// ── Correlation ──

export type StationValues = Readonly<Record<string, number>>;

export interface CorrelationRow {
  windowEnd: MonthPeriod;   // last month of the 12-month window
  values: StationValues;    // Pearson r per station against the reference window
}

export type CorrelationTable = readonly CorrelationRow[];

export interface RankedCandidate {
  rank: number;
  windowEnd: MonthPeriod;
  correlation: number;      // reference station's r
}

// ── Amplitude ──

export interface AmplitudeBound {
  min: number;
  max: number;
}

export type AmplitudeBounds = Readonly<Record<string, AmplitudeBound>>;

// ── Selection ──

export type RejectionReason = 'AmplitudeAboveMax' | 'AmplitudeBelowMin' | 'YearAlreadyUsed';

export interface RejectionRecord {
  year: number;
  windowEnd: MonthPeriod;
  correlation: number;
  reason: RejectionReason;
  count?: number;           // stations out of bound (amplitude reasons)
  limit?: number;           // threshold that was exceeded
}

export interface SelectionResult {
  rank: number;
  windowEnd: MonthPeriod;
  forecastStart: MonthPeriod;
  year: number;
  station: string;
  correlation: number;
  correlations: StationValues;
  aboveCount: number;
  belowCount: number;
  candidateRatios: StationValues;
  bounds: AmplitudeBounds | null;   // null for fixed-rank selection
  rejections: readonly RejectionRecord[];
  correlationTable: CorrelationTable;
}

// ── Batch ──

export interface ExtensionReportRow {
  file: string;
  rank: number;
  correlation: number;
  belowCount: number;
  aboveCount: number;
}

export interface FailureReportRow {
  file: string;
  station: string;
  code: string;
  message: string;
}

export interface BatchReport {
  extended: ExtensionReportRow[];
  failures: FailureReportRow[];
  durationMs: number;
}
