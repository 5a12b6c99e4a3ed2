import { EmptyWorkbookError, SheetNotFoundError } from '@/modules/extraction/domain/extraction-errors';
import { selectSheet } from './select-sheet';

describe('selectSheet', () => {
  const names = ['Summary', 'Data '];

  it('defaults to the first sheet', () => {
    expect(selectSheet('book.xlsx', names)).toBe(0);
  });

  it('takes 1-based indexes', () => {
    expect(selectSheet('book.xlsx', names, 2)).toBe(1);
    expect(() => selectSheet('book.xlsx', names, 0)).toThrow(SheetNotFoundError);
    expect(() => selectSheet('book.xlsx', names, 3)).toThrow(SheetNotFoundError);
  });

  it('prefers exact names and falls back to a trimmed, case-insensitive match', () => {
    expect(selectSheet('book.xlsx', names, 'Data ')).toBe(1);
    expect(selectSheet('book.xlsx', names, 'data')).toBe(1);
  });

  it('rejects workbooks without sheets', () => {
    expect(() => selectSheet('book.xlsx', [], 1)).toThrow(new EmptyWorkbookError('book.xlsx'));
  });
});
