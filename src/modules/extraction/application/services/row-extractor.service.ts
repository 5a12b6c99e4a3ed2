import { Injectable, Logger } from '@nestjs/common';
import type { WorksheetPort } from '@/modules/extraction/application/ports/workbook-opener.port';
import { isDateFormat, serialToDate } from '@/modules/extraction/application/utils/serial-date';
import type { CellValue, SheetRecord } from '@/modules/extraction/domain/cell-value';
import type { WarningSink } from '@/modules/extraction/domain/extraction-report';
import type { RangeSpec } from '@/modules/extraction/domain/range-spec';

export interface RowOptions {
  useDisplayText?: boolean;
  /** Extra number formats to treat as dates, matched against the cell's format. */
  dateFormat?: RegExp;
}

@Injectable()
export class RowExtractorService {
  private readonly logger = new Logger(RowExtractorService.name);

  extractRow(
    worksheet: WorksheetPort,
    row: number,
    range: RangeSpec,
    headers: string[],
    options: RowOptions,
    warn: WarningSink = () => undefined,
  ): SheetRecord {
    const record: SheetRecord = new Map();
    const width = Math.min(headers.length, range.columnEnd - range.columnStart + 1);

    for (let i = 0; i < width; i++) {
      const column = range.columnStart + i;
      const header = headers[i];
      const cell = worksheet.cell(row, column);
      let value: CellValue = options.useDisplayText ? cell.text : cell.value;

      // display text is already rendered by the cell's format
      const coerce = !options.useDisplayText && value !== null && value !== '';
      if (coerce && isDateFormat(cell.numberFormat, options.dateFormat)) {
        const date = typeof value === 'number' ? serialToDate(value, worksheet.date1904) : null;
        if (date) {
          value = date;
        } else {
          this.logger.debug(
            `Row ${row}, column ${column}: cannot read ${JSON.stringify(value)} as a date (format "${cell.numberFormat}")`,
          );
          warn({
            type: 'DATE_COERCION_FAILED',
            column,
            row,
            value,
            numberFormat: cell.numberFormat,
          });
        }
      }

      if (record.has(header)) {
        this.logger.warn(
          `Duplicate header "${header}" at row ${row}, column ${column}; keeping the first value, ignoring ${JSON.stringify(value)}`,
        );
        warn({ type: 'DUPLICATE_HEADER', header, column, row, value });
        continue;
      }
      record.set(header, value);
    }

    return record;
  }
}

export function isBlankRecord(record: SheetRecord): boolean {
  for (const value of record.values()) {
    if (value !== null && value !== '') return false;
  }
  return true;
}
