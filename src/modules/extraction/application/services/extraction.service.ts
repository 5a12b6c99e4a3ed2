import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  WORKBOOK_OPENER,
  type SheetIdentifier,
  type WorkbookHandle,
  type WorkbookOpenerPort,
} from '@/modules/extraction/application/ports/workbook-opener.port';
import {
  SheetRecordsService,
  type SheetRecordOptions,
} from '@/modules/extraction/application/services/sheet-records.service';
import type { ExtractedRecord } from '@/modules/extraction/domain/cell-value';
import { ExtractionError } from '@/modules/extraction/domain/extraction-errors';
import type {
  ExtractionReport,
  FileSummary,
  WarningSink,
} from '@/modules/extraction/domain/extraction-report';

export interface ExtractionRequest extends SheetRecordOptions {
  paths: string[];
  sheet?: SheetIdentifier;
  readTolerant?: boolean;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    @Inject(WORKBOOK_OPENER) private readonly opener: WorkbookOpenerPort,
    private readonly sheetRecords: SheetRecordsService,
  ) {}

  /**
   * Streams records from every input in order. File-level failures are added
   * to `report` and the next file is processed; each workbook is closed before
   * moving on, including when the consumer stops iterating.
   */
  *extract(
    request: ExtractionRequest,
    report: ExtractionReport,
  ): Generator<ExtractedRecord, void, undefined> {
    for (const file of request.paths) {
      const summary: FileSummary = { file, sheet: null, records: 0, status: 'ok' };
      report.files.push(summary);
      const warn: WarningSink = (warning) => report.warnings.push({ ...warning, file });

      let handle: WorkbookHandle | undefined;
      try {
        handle = this.opener.open({ path: file, readTolerant: request.readTolerant ?? false });
        const worksheet = handle.worksheet(request.sheet);
        summary.sheet = worksheet.name;

        const prepared = this.sheetRecords.prepare(worksheet, request, warn);
        this.logger.log(
          `${file} [${worksheet.name}]: rows ${prepared.firstDataRow}-${prepared.range.rowEnd}, columns ${prepared.range.columnStart}-${prepared.range.columnEnd}`,
        );

        for (const { row, record } of this.sheetRecords.rowsOf(worksheet, prepared, request, warn)) {
          summary.records++;
          yield { file, sheet: worksheet.name, row, record };
        }
      } catch (error) {
        if (!(error instanceof ExtractionError)) throw error;

        summary.status = 'failed';
        report.failures.push({ file, code: error.code, reason: error.message });
        this.logger.error(`Skipping ${file}: ${error.message}`);
      } finally {
        handle?.close();
      }
    }
  }
}
