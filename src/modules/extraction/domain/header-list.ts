export interface ResolvedHeaders {
  /** One entry per column of the range, index-aligned to columnStart. */
  headers: string[];
  /** `headers` without duplicates, first occurrence wins. */
  selected: string[];
  firstDataRow: number;
}

export function columnPlaceholder(column: number): string {
  return `<Column ${column}>`;
}
