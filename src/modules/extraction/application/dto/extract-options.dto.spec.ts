import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ExtractOptionsDto, toExtractionRequest } from './extract-options.dto';

describe('ExtractOptionsDto', () => {
  const validate = (plain: object) => {
    const dto = plainToInstance(ExtractOptionsDto, plain);
    return { dto, errors: validateSync(dto).map((error) => error.property) };
  };

  it('accepts a minimal request', () => {
    expect(validate({ paths: ['a.xlsx'] }).errors).toEqual([]);
  });

  it('accepts sheet names and positive sheet indexes', () => {
    expect(validate({ paths: ['a.xlsx'], sheet: 'Data' }).errors).toEqual([]);
    expect(validate({ paths: ['a.xlsx'], sheet: 2 }).errors).toEqual([]);
    expect(validate({ paths: ['a.xlsx'], sheet: 0 }).errors).toEqual(['sheet']);
  });

  it('rejects missing paths, bad starts and invalid patterns', () => {
    expect(
      validate({
        paths: [],
        rowStart: 0,
        columnStart: Number.NaN,
        headerRow: -1,
        dateFormat: '([',
      }).errors.sort(),
    ).toEqual(['columnStart', 'dateFormat', 'headerRow', 'paths', 'rowStart']);
  });

  it('allows non-positive ends, which select the whole extent', () => {
    expect(validate({ paths: ['a.xlsx'], rowEnd: 0, columnEnd: -1 }).errors).toEqual([]);
  });

  it('compiles the date format into a case-insensitive pattern', () => {
    const { dto } = validate({ paths: ['a.xlsx'], dateFormat: 'yyyy-mm-dd', output: 'out.ndjson' });

    const request = toExtractionRequest(dto);

    expect(request.paths).toEqual(['a.xlsx']);
    expect(request.dateFormat?.test('YYYY-MM-DD')).toBe(true);
    expect(request).not.toHaveProperty('output');
  });
});
