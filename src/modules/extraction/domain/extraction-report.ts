import type { CellValue } from './cell-value';
import type { ExtractionErrorCode } from './extraction-errors';

export type ExtractionWarning =
  | {
      type: 'DUPLICATE_HEADER';
      header: string;
      column: number;
      row: number;
      value: CellValue;
    }
  | {
      type: 'DATE_COERCION_FAILED';
      column: number;
      row: number;
      value: CellValue;
      numberFormat: string;
    }
  | {
      type: 'HEADER_COUNT_MISMATCH';
      expected: number;
      received: number;
    };

export interface ExtractionFailure {
  file: string;
  code: ExtractionErrorCode;
  reason: string;
}

export interface FileSummary {
  file: string;
  sheet: string | null;
  records: number;
  status: 'ok' | 'failed';
}

export interface ExtractionReport {
  files: FileSummary[];
  warnings: Array<ExtractionWarning & { file: string }>;
  failures: ExtractionFailure[];
}

/** Receives non-fatal findings while a worksheet is processed. */
export type WarningSink = (warning: ExtractionWarning) => void;

export function createReport(): ExtractionReport {
  return { files: [], warnings: [], failures: [] };
}
