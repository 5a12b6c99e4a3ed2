import type { SheetRecord } from '@/modules/extraction/domain/cell-value';

/** Keeps only the selected fields, in selected order. */
export function projectRecord(record: SheetRecord, selected: readonly string[]): SheetRecord {
  const projected: SheetRecord = new Map();
  for (const header of selected) {
    if (record.has(header)) {
      projected.set(header, record.get(header) ?? null);
    }
  }
  return projected;
}
