import { basename } from 'path';
import { parse as csvParse } from 'csv-parse/sync';
import type {
  CellSnapshot,
  SheetIdentifier,
  WorkbookHandle,
  WorksheetPort,
} from '@/modules/extraction/application/ports/workbook-opener.port';
import { fileBaseName } from '@/modules/extraction/application/utils/normalize';
import type { CellValue } from '@/modules/extraction/domain/cell-value';
import type { WorksheetDimension } from '@/modules/extraction/domain/range-spec';
import { selectSheet } from '@/modules/extraction/infra/workbook/select-sheet';

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER = /^[-+]?\d+$/;
// zip codes, account numbers and similar identifiers
const LEADING_ZERO = /^[-+]?0\d/;

/** A delimited text file exposed as a workbook with a single sheet. */
export class CsvWorksheet implements WorksheetPort {
  readonly date1904 = false;
  private readonly columnCount: number;

  constructor(
    readonly name: string,
    private readonly rows: string[][],
  ) {
    this.columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);
  }

  dimension(): WorksheetDimension {
    return { rowCount: this.rows.length, columnCount: this.columnCount };
  }

  cell(row: number, column: number): CellSnapshot {
    const text = this.rows[row - 1]?.[column - 1] ?? '';
    return {
      value: typedValue(text),
      text: text === '' ? null : text,
      numberFormat: 'General',
    };
  }
}

export class CsvWorkbook implements WorkbookHandle {
  readonly sheetNames: string[];
  private readonly sheet: CsvWorksheet;

  constructor(
    readonly path: string,
    content: Buffer,
    private readonly release: () => void = () => undefined,
  ) {
    const rows: string[][] = csvParse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: false,
    });
    this.sheet = new CsvWorksheet(fileBaseName(basename(path)), rows);
    this.sheetNames = [this.sheet.name];
  }

  worksheet(sheet?: SheetIdentifier): WorksheetPort {
    selectSheet(this.path, this.sheetNames, sheet);
    return this.sheet;
  }

  close(): void {
    this.release();
  }
}

/** Numbers only when the text survives the conversion; anything else stays text. */
function typedValue(text: string): CellValue {
  if (text === '') return null;

  const trimmed = text.trim();
  if (!NUMERIC.test(trimmed) || LEADING_ZERO.test(trimmed)) return text;

  const value = Number(trimmed);
  if (!Number.isFinite(value)) return text;
  if (INTEGER.test(trimmed) && !Number.isSafeInteger(value)) return text;
  return value;
}
