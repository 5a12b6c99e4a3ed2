export type ExtractionErrorCode =
  | 'OPEN_FAILED'
  | 'SHEET_NOT_FOUND'
  | 'EMPTY_WORKBOOK'
  | 'INVALID_RANGE'
  | 'HEADER_COUNT_MISMATCH';

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type OpenFailureReason = 'missing' | 'locked' | 'corrupt' | 'unsupported';

export class OpenError extends ExtractionError {
  readonly code = 'OPEN_FAILED';

  constructor(
    readonly path: string,
    readonly reason: OpenFailureReason,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot open "${path}" (${reason})${detail ? `: ${detail}` : ''}`, options);
  }
}

export class SheetNotFoundError extends ExtractionError {
  readonly code = 'SHEET_NOT_FOUND';

  constructor(
    readonly sheet: number | string,
    readonly available: string[],
  ) {
    super(`Worksheet ${JSON.stringify(sheet)} not found. Available: ${available.join(', ')}`);
  }
}

export class EmptyWorkbookError extends ExtractionError {
  readonly code = 'EMPTY_WORKBOOK';

  constructor(readonly path: string) {
    super(`Workbook "${path}" has no worksheets`);
  }
}

export class InvalidRangeError extends ExtractionError {
  readonly code = 'INVALID_RANGE';
}

export class HeaderCountMismatchError extends ExtractionError {
  readonly code = 'HEADER_COUNT_MISMATCH';

  constructor(
    readonly expected: number,
    readonly received: number,
  ) {
    super(`Expected ${expected} header(s) for the selected columns, received ${received}`);
  }
}
