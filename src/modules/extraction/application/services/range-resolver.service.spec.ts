import { InvalidRangeError } from '@/modules/extraction/domain/extraction-errors';
import { RangeResolverService } from './range-resolver.service';

describe('RangeResolverService', () => {
  const resolver = new RangeResolverService();
  const dimension = { rowCount: 10, columnCount: 5 };

  it('defaults to the whole used range', () => {
    expect(resolver.resolve(dimension)).toEqual({
      rowStart: 1,
      rowEnd: 10,
      columnStart: 1,
      columnEnd: 5,
    });
  });

  it('treats end overrides as absolute indexes', () => {
    expect(resolver.resolve(dimension, { columnStart: 2, columnEnd: 3, rowStart: 4, rowEnd: 6 })).toEqual({
      rowStart: 4,
      rowEnd: 6,
      columnStart: 2,
      columnEnd: 3,
    });
  });

  it('falls back to the worksheet bounds for non-positive or oversized ends', () => {
    expect(resolver.resolve(dimension, { rowEnd: 0, columnEnd: -1 })).toMatchObject({
      rowEnd: 10,
      columnEnd: 5,
    });
    expect(resolver.resolve(dimension, { rowEnd: 99, columnEnd: 40 })).toMatchObject({
      rowEnd: 10,
      columnEnd: 5,
    });
  });

  it('rejects starts below 1', () => {
    expect(() => resolver.resolve(dimension, { rowStart: 0 })).toThrow(InvalidRangeError);
    expect(() => resolver.resolve(dimension, { columnStart: -2 })).toThrow(
      'columnStart must be an integer >= 1, got -2',
    );
  });

  it('rejects ranges whose start is past the end', () => {
    expect(() => resolver.resolve(dimension, { rowStart: 7, rowEnd: 3 })).toThrow(
      'Row range is empty: rowStart=7 > rowEnd=3 (worksheet has 10 row(s))',
    );
    expect(() => resolver.resolve(dimension, { columnStart: 6 })).toThrow(InvalidRangeError);
  });

  it('rejects an empty worksheet', () => {
    expect(() => resolver.resolve({ rowCount: 0, columnCount: 0 })).toThrow(InvalidRangeError);
  });

  it('always yields ordered bounds when it succeeds', () => {
    for (let rowStart = 1; rowStart <= 12; rowStart++) {
      for (let rowEnd = -1; rowEnd <= 12; rowEnd++) {
        try {
          const range = resolver.resolve(dimension, { rowStart, rowEnd });
          expect(range.rowStart).toBeLessThanOrEqual(range.rowEnd);
          expect(range.rowEnd).toBeLessThanOrEqual(dimension.rowCount);
        } catch (error) {
          expect(error).toBeInstanceOf(InvalidRangeError);
        }
      }
    }
  });
});
