import { parseArgs } from './cli-args';

describe('parseArgs', () => {
  it('collects paths and flags', () => {
    expect(
      parseArgs([
        'a.xlsx',
        '--sheet',
        'Data',
        'b.csv',
        '--first-row-is-data',
        '--display-text',
        '--read-tolerant',
        '--skip-blank-rows',
        '--strict-headers',
      ]),
    ).toEqual({
      paths: ['a.xlsx', 'b.csv'],
      sheet: 'Data',
      firstRowIsData: true,
      useDisplayText: true,
      readTolerant: true,
      skipBlankRows: true,
      strictHeaders: true,
    });
  });

  it('parses numbers, column letters and header lists', () => {
    expect(
      parseArgs([
        'a.xlsx',
        '--sheet=2',
        '--headers',
        'id, name ,total',
        '--row-start=3',
        '--row-end',
        '10',
        '--column-start',
        'b',
        '--column-end=AA',
        '--header-row',
        '2',
        '--date-format',
        'yyyy-mm-dd',
        '--output',
        'out.ndjson',
      ]),
    ).toEqual({
      paths: ['a.xlsx'],
      sheet: 2,
      headers: ['id', 'name', 'total'],
      rowStart: 3,
      rowEnd: 10,
      columnStart: 2,
      columnEnd: 27,
      headerRow: 2,
      dateFormat: 'yyyy-mm-dd',
      output: 'out.ndjson',
    });
  });

  it('marks malformed numbers as NaN for validation to reject', () => {
    expect(parseArgs(['a.xlsx', '--row-start', 'x']).rowStart).toBeNaN();
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['a.xlsx', '--sheet'])).toThrow('Option --sheet requires a value');
    expect(() => parseArgs(['--column-end', '3x'])).toThrow('Invalid column label: "3x"');
  });
});
