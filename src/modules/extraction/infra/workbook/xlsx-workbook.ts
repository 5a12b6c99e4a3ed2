import * as XLSX from 'xlsx';
import type {
  CellSnapshot,
  SheetIdentifier,
  WorkbookHandle,
  WorksheetPort,
} from '@/modules/extraction/application/ports/workbook-opener.port';
import type { CellValue } from '@/modules/extraction/domain/cell-value';
import type { WorksheetDimension } from '@/modules/extraction/domain/range-spec';
import { selectSheet } from '@/modules/extraction/infra/workbook/select-sheet';

const GENERAL_FORMAT = 'General';
const EMPTY_CELL: CellSnapshot = { value: null, text: null, numberFormat: GENERAL_FORMAT };

export class XlsxWorksheet implements WorksheetPort {
  constructor(
    readonly name: string,
    private readonly sheet: XLSX.WorkSheet,
    readonly date1904: boolean,
  ) {}

  dimension(): WorksheetDimension {
    const ref = this.sheet['!ref'];
    if (!ref) return { rowCount: 0, columnCount: 0 };

    // Counted from A1 so that indexes stay absolute
    const range = XLSX.utils.decode_range(ref);
    return { rowCount: range.e.r + 1, columnCount: range.e.c + 1 };
  }

  cell(row: number, column: number): CellSnapshot {
    const address = XLSX.utils.encode_cell({ r: row - 1, c: column - 1 });
    const cell: XLSX.CellObject | undefined = this.sheet[address];
    if (!cell || cell.t === 'z') return EMPTY_CELL;

    return {
      value: typedValue(cell),
      text: cell.w ?? XLSX.utils.format_cell(cell),
      numberFormat: typeof cell.z === 'string' ? cell.z : GENERAL_FORMAT,
    };
  }
}

export class XlsxWorkbook implements WorkbookHandle {
  constructor(
    readonly path: string,
    private readonly workbook: XLSX.WorkBook,
    private readonly release: () => void = () => undefined,
  ) {}

  get sheetNames(): string[] {
    return this.workbook.SheetNames;
  }

  worksheet(sheet?: SheetIdentifier): WorksheetPort {
    const name = this.sheetNames[selectSheet(this.path, this.sheetNames, sheet)];
    const date1904 = this.workbook.Workbook?.WBProps?.date1904 ?? false;
    return new XlsxWorksheet(name, this.workbook.Sheets[name], date1904);
  }

  close(): void {
    this.release();
  }
}

function typedValue(cell: XLSX.CellObject): CellValue {
  switch (cell.t) {
    case 'n':
      return typeof cell.v === 'number' ? cell.v : null;
    case 'b':
      return typeof cell.v === 'boolean' ? cell.v : null;
    case 'd':
      return cell.v instanceof Date ? cell.v : null;
    case 's':
      return cell.v === undefined ? null : String(cell.v);
    case 'e':
      // error cells surface their rendered code, e.g. #DIV/0!
      return cell.w ?? null;
    default:
      return null;
  }
}
