import { parseColumnRef } from '@/modules/extraction/application/utils/column-label';

export interface CliArgs {
  paths: string[];
  sheet?: number | string;
  headers?: string[];
  firstRowIsData?: boolean;
  useDisplayText?: boolean;
  dateFormat?: string;
  rowStart?: number;
  rowEnd?: number;
  columnStart?: number;
  columnEnd?: number;
  headerRow?: number;
  readTolerant?: boolean;
  strictHeaders?: boolean;
  skipBlankRows?: boolean;
  output?: string;
  help?: boolean;
}

export const USAGE = `Usage: extract-records <file...> [options]

  --sheet <index|name>        worksheet to read (default: 1)
  --headers <a,b,c>           use these header names
  --first-row-is-data         name columns A, B, C... and read the first row as data
  --header-row <n>            read header names from row n
  --display-text              read rendered text instead of typed values
  --date-format <regex>       extra number formats to read as dates
  --row-start <n>             first row of the region (default: 1)
  --row-end <n>               last row of the region (default: last used row)
  --column-start <n|letter>   first column of the region (default: A)
  --column-end <n|letter>     last column of the region (default: last used column)
  --read-tolerant             read files without holding them open
  --strict-headers            fail a file when --headers does not match the column count
  --skip-blank-rows           do not emit rows without values
  --output <file>             write NDJSON to a file instead of stdout
  --help                      show this message`;

type ValueParser = (raw: string) => Partial<CliArgs>;

const toInt = (raw: string): number => (/^-?\d+$/.test(raw.trim()) ? Number(raw) : Number.NaN);

const VALUE_FLAGS: Record<string, ValueParser> = {
  '--sheet': (raw) => ({ sheet: /^\d+$/.test(raw.trim()) ? Number(raw) : raw }),
  '--headers': (raw) => ({ headers: raw.split(',').map((header) => header.trim()) }),
  '--date-format': (raw) => ({ dateFormat: raw }),
  '--row-start': (raw) => ({ rowStart: toInt(raw) }),
  '--row-end': (raw) => ({ rowEnd: toInt(raw) }),
  '--column-start': (raw) => ({ columnStart: parseColumnRef(raw) }),
  '--column-end': (raw) => ({ columnEnd: parseColumnRef(raw) }),
  '--header-row': (raw) => ({ headerRow: toInt(raw) }),
  '--output': (raw) => ({ output: raw }),
};

const BOOLEAN_FLAGS: Record<string, keyof CliArgs> = {
  '--first-row-is-data': 'firstRowIsData',
  '--display-text': 'useDisplayText',
  '--read-tolerant': 'readTolerant',
  '--strict-headers': 'strictHeaders',
  '--skip-blank-rows': 'skipBlankRows',
  '--help': 'help',
};

/** Binds command line flags; `--flag=value` and `--flag value` are both accepted. */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { paths: [] };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (!token.startsWith('--')) {
      args.paths.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    const flag = eq >= 0 ? token.slice(0, eq) : token;

    const booleanKey = BOOLEAN_FLAGS[flag];
    if (booleanKey) {
      Object.assign(args, { [booleanKey]: true });
      continue;
    }

    const parse = VALUE_FLAGS[flag];
    if (!parse) {
      throw new Error(`Unknown option: ${flag}`);
    }

    let raw: string | undefined;
    if (eq >= 0) {
      raw = token.slice(eq + 1);
    } else {
      i++;
      raw = argv[i];
    }
    if (raw === undefined) {
      throw new Error(`Option ${flag} requires a value`);
    }
    Object.assign(args, parse(raw));
  }

  return args;
}
