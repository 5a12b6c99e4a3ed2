export interface WorksheetDimension {
  rowCount: number;
  columnCount: number;
}

// 1-based, inclusive on both ends
export interface RangeSpec {
  rowStart: number;
  rowEnd: number;
  columnStart: number;
  columnEnd: number;
}

export interface RangeOverrides {
  rowStart?: number;
  rowEnd?: number;
  columnStart?: number;
  columnEnd?: number;
}

export function columnCountOf(range: RangeSpec): number {
  return range.columnEnd - range.columnStart + 1;
}
