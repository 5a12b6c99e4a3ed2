export type CellValue = string | number | boolean | Date | null;

/** One row of output, keyed by header name in column order. */
export type SheetRecord = Map<string, CellValue>;

export interface ExtractedRecord {
  file: string;
  sheet: string;
  row: number;
  record: SheetRecord;
}

export function recordToObject(record: SheetRecord): Record<string, CellValue> {
  return Object.fromEntries(record);
}
