// ═══════════════════════════════════════════════════════
// errors.ts — Error taxonomy of the extension pipeline
// ═══════════════════════════════════════════════════════
import type { RejectionRecord } from '../types.ts';

export type ExtensionErrorCode =
  | 'INVALID_INDEX_KIND'        // index not a strict consecutive monthly sequence
  | 'INSUFFICIENT_HISTORY'      // too few months, or no valid ratio for a station
  | 'NO_ACCEPTABLE_ANALOG'      // every ranked candidate was rejected
  | 'HORIZON_EXCEEDS_HISTORY'   // forecast horizon runs past the analog data
  | 'UNKNOWN_STATION'           // reference station is not a column
  | 'INVALID_SERIES_FILE';      // series source could not parse the file

export class ExtensionError extends Error {
  code: ExtensionErrorCode;
  constructor(message: string, code: ExtensionErrorCode) {
    super(message);
    this.name = 'ExtensionError';
    this.code = code;
  }
}

export class NoAcceptableAnalogError extends ExtensionError {
  readonly rejections: readonly RejectionRecord[];
  constructor(message: string, rejections: readonly RejectionRecord[]) {
    super(message, 'NO_ACCEPTABLE_ANALOG');
    this.name = 'NoAcceptableAnalogError';
    this.rejections = rejections;
  }
}

export function isExtensionError(err: unknown): err is ExtensionError {
  return err instanceof ExtensionError;
}
