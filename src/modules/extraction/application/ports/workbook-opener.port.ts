import type { CellValue } from '@/modules/extraction/domain/cell-value';
import type { WorksheetDimension } from '@/modules/extraction/domain/range-spec';

export const WORKBOOK_OPENER = Symbol('WORKBOOK_OPENER');

export type SheetIdentifier = number | string;

export interface OpenWorkbookParams {
  path: string;
  /** Read the bytes without holding the file open. */
  readTolerant: boolean;
}

export interface CellSnapshot {
  value: CellValue;
  /** Rendered text, `null` when the cell is empty. */
  text: string | null;
  numberFormat: string;
}

export interface WorksheetPort {
  readonly name: string;
  /** Serial dates count from 1904-01-01 instead of 1900-01-00. */
  readonly date1904: boolean;
  dimension(): WorksheetDimension;
  cell(row: number, column: number): CellSnapshot;
}

export interface WorkbookHandle {
  readonly path: string;
  readonly sheetNames: string[];
  /** 1-based index or sheet name; defaults to the first sheet. */
  worksheet(sheet?: SheetIdentifier): WorksheetPort;
  close(): void;
}

export interface WorkbookOpenerPort {
  open(params: OpenWorkbookParams): WorkbookHandle;
}
