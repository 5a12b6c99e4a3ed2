import { closeSync, openSync, readFileSync } from 'fs';
import { Injectable, Logger } from '@nestjs/common';
import * as XLSX from 'xlsx';
import type {
  OpenWorkbookParams,
  WorkbookHandle,
  WorkbookOpenerPort,
} from '@/modules/extraction/application/ports/workbook-opener.port';
import { fileExtension } from '@/modules/extraction/application/utils/normalize';
import { OpenError } from '@/modules/extraction/domain/extraction-errors';
import { CsvWorkbook } from '@/modules/extraction/infra/workbook/csv-workbook';
import { XlsxWorkbook } from '@/modules/extraction/infra/workbook/xlsx-workbook';

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const CFB_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);

// Package signatures accepted for each workbook extension
const WORKBOOK_SIGNATURES = new Map<string, Buffer[]>([
  ['xlsx', [ZIP_SIGNATURE]],
  ['xlsm', [ZIP_SIGNATURE]],
  ['ods', [ZIP_SIGNATURE]],
  ['xls', [CFB_SIGNATURE]],
  ['xlsb', [ZIP_SIGNATURE, CFB_SIGNATURE]],
]);
const TEXT_EXTENSIONS = new Set(['csv']);

interface AcquiredFile {
  bytes: Buffer;
  release: () => void;
}

@Injectable()
export class WorkbookOpenerService implements WorkbookOpenerPort {
  private readonly logger = new Logger(WorkbookOpenerService.name);

  open(params: OpenWorkbookParams): WorkbookHandle {
    const { path, readTolerant } = params;
    const extension = fileExtension(path);

    const signatures = WORKBOOK_SIGNATURES.get(extension);
    if (!signatures && !TEXT_EXTENSIONS.has(extension)) {
      throw new OpenError(path, 'unsupported', `extension ".${extension}" is not supported`);
    }

    const file = this.acquire(path, readTolerant);
    try {
      let handle: WorkbookHandle;
      if (signatures) {
        // SheetJS falls back to delimited text for unrecognised bytes
        if (!signatures.some((signature) => startsWith(file.bytes, signature))) {
          throw new OpenError(path, 'corrupt', `not a valid .${extension} package`);
        }
        handle = new XlsxWorkbook(path, this.readWorkbook(file.bytes), file.release);
      } else {
        handle = new CsvWorkbook(path, file.bytes, file.release);
      }
      this.logger.debug(
        `Opened ${path} (${readTolerant ? 'read-tolerant' : 'exclusive'}), sheets: ${handle.sheetNames.join(', ')}`,
      );
      return handle;
    } catch (error) {
      file.release();
      if (error instanceof OpenError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new OpenError(path, 'corrupt', message, { cause: error });
    }
  }

  private readWorkbook(bytes: Buffer): XLSX.WorkBook {
    return XLSX.read(bytes, {
      type: 'buffer',
      cellDates: false,
      cellNF: true,
      cellFormula: false,
      cellStyles: false,
    });
  }

  /**
   * Exclusive mode keeps a read/write descriptor until the handle is closed,
   * which fails on read-only or locked files. Read-tolerant mode only copies
   * the bytes.
   */
  private acquire(path: string, readTolerant: boolean): AcquiredFile {
    try {
      if (readTolerant) {
        return { bytes: readFileSync(path), release: () => undefined };
      }

      const fd = openSync(path, 'r+');
      try {
        return { bytes: readFileSync(fd), release: once(() => closeSync(fd)) };
      } catch (error) {
        closeSync(fd);
        throw error;
      }
    } catch (error) {
      throw toOpenError(path, error);
    }
  }
}

function toOpenError(path: string, error: unknown): OpenError {
  const code = isErrnoException(error) ? error.code : undefined;
  const message = error instanceof Error ? error.message : String(error);

  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new OpenError(path, 'missing', 'file does not exist', { cause: error });
    case 'EACCES':
    case 'EPERM':
    case 'EBUSY':
    case 'EROFS':
      return new OpenError(path, 'locked', `${message}; retry with read-tolerant mode`, {
        cause: error,
      });
    default:
      return new OpenError(path, 'corrupt', message, { cause: error });
  }
}

function startsWith(bytes: Buffer, signature: Buffer): boolean {
  return bytes.length >= signature.length && bytes.subarray(0, signature.length).equals(signature);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function once(fn: () => void): () => void {
  let called = false;
  return () => {
    if (called) return;
    called = true;
    fn();
  };
}
