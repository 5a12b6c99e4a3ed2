import { Injectable } from '@nestjs/common';
import type { WorksheetPort } from '@/modules/extraction/application/ports/workbook-opener.port';
import {
  HeaderResolverService,
  type HeaderOptions,
} from '@/modules/extraction/application/services/header-resolver.service';
import { RangeResolverService } from '@/modules/extraction/application/services/range-resolver.service';
import {
  isBlankRecord,
  RowExtractorService,
  type RowOptions,
} from '@/modules/extraction/application/services/row-extractor.service';
import { projectRecord } from '@/modules/extraction/application/utils/project-record';
import type { SheetRecord } from '@/modules/extraction/domain/cell-value';
import type { WarningSink } from '@/modules/extraction/domain/extraction-report';
import type { RangeOverrides, RangeSpec } from '@/modules/extraction/domain/range-spec';

export interface SheetRecordOptions extends RangeOverrides, HeaderOptions, RowOptions {
  skipBlankRows?: boolean;
}

export interface PreparedSheet {
  range: RangeSpec;
  headers: string[];
  selected: string[];
  firstDataRow: number;
}

export interface SheetRow {
  row: number;
  record: SheetRecord;
}

@Injectable()
export class SheetRecordsService {
  constructor(
    private readonly ranges: RangeResolverService,
    private readonly headerResolver: HeaderResolverService,
    private readonly rows: RowExtractorService,
  ) {}

  /**
   * Resolves range and headers. Throws the worksheet-level errors eagerly so
   * callers can fail a file before any record is emitted.
   */
  prepare(worksheet: WorksheetPort, options: SheetRecordOptions, warn?: WarningSink): PreparedSheet {
    const range = this.ranges.resolve(worksheet.dimension(), options);
    const { headers, selected, firstDataRow } = this.headerResolver.resolve(
      worksheet,
      range,
      options,
      warn,
    );
    return { range, headers, selected, firstDataRow };
  }

  *rowsOf(
    worksheet: WorksheetPort,
    prepared: PreparedSheet,
    options: SheetRecordOptions,
    warn?: WarningSink,
  ): Generator<SheetRow, void, undefined> {
    const { range, headers, selected, firstDataRow } = prepared;

    for (let row = firstDataRow; row <= range.rowEnd; row++) {
      const record = this.rows.extractRow(worksheet, row, range, headers, options, warn);
      if (options.skipBlankRows && isBlankRecord(record)) continue;
      yield { row, record: projectRecord(record, selected) };
    }
  }

  *records(
    worksheet: WorksheetPort,
    options: SheetRecordOptions = {},
    warn?: WarningSink,
  ): Generator<SheetRecord, void, undefined> {
    const prepared = this.prepare(worksheet, options, warn);
    for (const { record } of this.rowsOf(worksheet, prepared, options, warn)) {
      yield record;
    }
  }
}
