import type { SheetIdentifier } from '@/modules/extraction/application/ports/workbook-opener.port';
import { EmptyWorkbookError, SheetNotFoundError } from '@/modules/extraction/domain/extraction-errors';

/** Returns the 0-based position of the requested sheet. */
export function selectSheet(path: string, names: string[], sheet: SheetIdentifier = 1): number {
  if (names.length === 0) throw new EmptyWorkbookError(path);

  if (typeof sheet === 'number') {
    if (Number.isInteger(sheet) && sheet >= 1 && sheet <= names.length) return sheet - 1;
    throw new SheetNotFoundError(sheet, names);
  }

  const exact = names.indexOf(sheet);
  if (exact >= 0) return exact;

  const wanted = sheet.trim().toLowerCase();
  const loose = names.findIndex((name) => name.trim().toLowerCase() === wanted);
  if (loose >= 0) return loose;

  throw new SheetNotFoundError(sheet, names);
}
