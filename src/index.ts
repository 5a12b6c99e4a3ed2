import 'reflect-metadata';

export { AppModule } from './app.module';
export { ExtractionModule } from './modules/extraction/extraction.module';
export {
  ExtractionService,
  type ExtractionRequest,
} from './modules/extraction/application/services/extraction.service';
export {
  SheetRecordsService,
  type SheetRecordOptions,
} from './modules/extraction/application/services/sheet-records.service';
export { RangeResolverService } from './modules/extraction/application/services/range-resolver.service';
export { HeaderResolverService } from './modules/extraction/application/services/header-resolver.service';
export { RowExtractorService } from './modules/extraction/application/services/row-extractor.service';
export { projectRecord } from './modules/extraction/application/utils/project-record';
export { columnIndex, columnLabel } from './modules/extraction/application/utils/column-label';
export { serialToDate } from './modules/extraction/application/utils/serial-date';
export * from './modules/extraction/application/ports/workbook-opener.port';
export * from './modules/extraction/domain/cell-value';
export * from './modules/extraction/domain/extraction-errors';
export * from './modules/extraction/domain/extraction-report';
export * from './modules/extraction/domain/range-spec';
