import { Module } from '@nestjs/common';
import { WORKBOOK_OPENER } from '@/modules/extraction/application/ports/workbook-opener.port';
import { ExtractionService } from '@/modules/extraction/application/services/extraction.service';
import { HeaderResolverService } from '@/modules/extraction/application/services/header-resolver.service';
import { RangeResolverService } from '@/modules/extraction/application/services/range-resolver.service';
import { RowExtractorService } from '@/modules/extraction/application/services/row-extractor.service';
import { SheetRecordsService } from '@/modules/extraction/application/services/sheet-records.service';
import { WorkbookOpenerService } from '@/modules/extraction/infra/workbook/workbook-opener.service';

@Module({
  providers: [
    RangeResolverService,
    HeaderResolverService,
    RowExtractorService,
    SheetRecordsService,
    ExtractionService,
    {
      provide: WORKBOOK_OPENER,
      useClass: WorkbookOpenerService,
    },
  ],
  exports: [ExtractionService, SheetRecordsService],
})
export class ExtractionModule {}
