import { Injectable, Logger } from '@nestjs/common';
import type { WorksheetPort } from '@/modules/extraction/application/ports/workbook-opener.port';
import { columnLabel } from '@/modules/extraction/application/utils/column-label';
import type { CellValue } from '@/modules/extraction/domain/cell-value';
import { HeaderCountMismatchError } from '@/modules/extraction/domain/extraction-errors';
import type { WarningSink } from '@/modules/extraction/domain/extraction-report';
import { columnPlaceholder, type ResolvedHeaders } from '@/modules/extraction/domain/header-list';
import { columnCountOf, type RangeSpec } from '@/modules/extraction/domain/range-spec';

export interface HeaderOptions {
  headers?: string[];
  firstRowIsData?: boolean;
  headerRow?: number;
  useDisplayText?: boolean;
  /** Turn a header count mismatch into a failure instead of a warning. */
  strictHeaders?: boolean;
}

@Injectable()
export class HeaderResolverService {
  private readonly logger = new Logger(HeaderResolverService.name);

  resolve(
    worksheet: WorksheetPort,
    range: RangeSpec,
    options: HeaderOptions,
    warn: WarningSink = () => undefined,
  ): ResolvedHeaders {
    const headers = this.headersFor(worksheet, range, options, warn);

    return {
      headers,
      selected: [...new Set(headers)],
      firstDataRow: this.firstDataRow(range, options),
    };
  }

  private headersFor(
    worksheet: WorksheetPort,
    range: RangeSpec,
    options: HeaderOptions,
    warn: WarningSink,
  ): string[] {
    const expected = columnCountOf(range);

    if (options.headers && options.headers.length > 0) {
      if (options.headers.length !== expected) {
        if (options.strictHeaders) {
          throw new HeaderCountMismatchError(expected, options.headers.length);
        }
        this.logger.error(
          `Received ${options.headers.length} header(s) for ${expected} column(s); using them as given`,
        );
        warn({ type: 'HEADER_COUNT_MISMATCH', expected, received: options.headers.length });
      }
      return options.headers.map((header, i) => sanitize(header, range.columnStart + i));
    }

    const columns = Array.from({ length: expected }, (_, i) => range.columnStart + i);

    if (options.firstRowIsData) {
      return columns.map((column) => columnLabel(column));
    }

    if (options.headerRow !== undefined && options.headerRow >= 1) {
      const headerRow = options.headerRow;
      return columns.map((column) => sanitize(worksheet.cell(headerRow, column).value, column));
    }

    return columns.map((column) => {
      const cell = worksheet.cell(range.rowStart, column);
      return sanitize(options.useDisplayText ? cell.text : cell.value, column);
    });
  }

  private firstDataRow(range: RangeSpec, options: HeaderOptions): number {
    if (options.firstRowIsData) return range.rowStart;
    if (options.headerRow !== undefined && options.headerRow >= 1) {
      return Math.max(range.rowStart, options.headerRow + 1);
    }
    return range.rowStart + 1;
  }
}

function sanitize(value: CellValue | undefined, column: number): string {
  if (typeof value !== 'string') return columnPlaceholder(column);
  const trimmed = value.trim();
  return trimmed.length ? trimmed : columnPlaceholder(column);
}
