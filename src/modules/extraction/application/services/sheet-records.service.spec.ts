import { recordToObject } from '@/modules/extraction/domain/cell-value';
import { InvalidRangeError } from '@/modules/extraction/domain/extraction-errors';
import { InMemoryWorksheet } from '@/testing/in-memory-workbook';
import { HeaderResolverService } from './header-resolver.service';
import { RangeResolverService } from './range-resolver.service';
import { RowExtractorService } from './row-extractor.service';
import { SheetRecordsService, type SheetRecordOptions } from './sheet-records.service';

describe('SheetRecordsService', () => {
  const service = new SheetRecordsService(
    new RangeResolverService(),
    new HeaderResolverService(),
    new RowExtractorService(),
  );

  const collect = (sheet: InMemoryWorksheet, options: SheetRecordOptions = {}) =>
    [...service.records(sheet, options)].map(recordToObject);

  const people = () =>
    new InMemoryWorksheet([
      ['Name', 'Age', 'City'],
      ['Ann', 30, 'NY'],
      ['Bo', 41, 'LA'],
    ]);

  it('yields one record per data row in row order', () => {
    expect(collect(people())).toEqual([
      { Name: 'Ann', Age: 30, City: 'NY' },
      { Name: 'Bo', Age: 41, City: 'LA' },
    ]);
  });

  it('keeps header order in every record', () => {
    const [first] = service.records(people());
    expect([...first.keys()]).toEqual(['Name', 'Age', 'City']);
  });

  it('treats the start row as the header row', () => {
    const sheet = new InMemoryWorksheet([
      ['Exported on Monday', null, null],
      ['Name', 'Age', 'City'],
      ['Ann', 30, 'NY'],
    ]);

    expect(collect(sheet, { rowStart: 2 })).toEqual([{ Name: 'Ann', Age: 30, City: 'NY' }]);
  });

  it('limits every record to the columns up to columnEnd', () => {
    expect(collect(people(), { columnEnd: 2 })).toEqual([
      { Name: 'Ann', Age: 30 },
      { Name: 'Bo', Age: 41 },
    ]);
  });

  it('reads every row as data with generated column names', () => {
    expect(collect(people(), { firstRowIsData: true, rowEnd: 2 })).toEqual([
      { A: 'Name', B: 'Age', C: 'City' },
      { A: 'Ann', B: 30, C: 'NY' },
    ]);
  });

  it('drops duplicated columns from the output', () => {
    const sheet = new InMemoryWorksheet([
      ['id', 'id', 'name'],
      [1, 2, 'Ann'],
    ]);

    const [record] = service.records(sheet);
    expect([...record.entries()]).toEqual([
      ['id', 1],
      ['name', 'Ann'],
    ]);
  });

  it('skips blank rows on request', () => {
    const sheet = new InMemoryWorksheet([['a'], [1], [null], [3]]);

    expect(collect(sheet)).toEqual([{ a: 1 }, { a: null }, { a: 3 }]);
    expect(collect(sheet, { skipBlankRows: true })).toEqual([{ a: 1 }, { a: 3 }]);
  });

  it('emits nothing when the range only holds the header row', () => {
    expect(collect(people(), { rowEnd: 1 })).toEqual([]);
  });

  it('reads rows lazily', () => {
    const sheet = people();
    const records = service.records(sheet);

    records.next();
    const rowsRead = new Set(sheet.reads.map(([row]) => row));
    expect([...rowsRead]).toEqual([1, 2]);
  });

  it('fails on an invalid range', () => {
    expect(() => collect(people(), { rowStart: 9 })).toThrow(InvalidRangeError);
  });
});
