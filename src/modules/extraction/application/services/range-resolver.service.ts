import { Injectable } from '@nestjs/common';
import { InvalidRangeError } from '@/modules/extraction/domain/extraction-errors';
import type {
  RangeOverrides,
  RangeSpec,
  WorksheetDimension,
} from '@/modules/extraction/domain/range-spec';

@Injectable()
export class RangeResolverService {
  /**
   * Computes the inclusive region to read. End overrides are absolute indexes:
   * missing or non-positive values fall back to the worksheet extent and values
   * past it are clamped.
   */
  resolve(dimension: WorksheetDimension, overrides: RangeOverrides = {}): RangeSpec {
    const rowStart = this.start('rowStart', overrides.rowStart);
    const columnStart = this.start('columnStart', overrides.columnStart);
    const rowEnd = this.end('rowEnd', overrides.rowEnd, dimension.rowCount);
    const columnEnd = this.end('columnEnd', overrides.columnEnd, dimension.columnCount);

    if (rowStart > rowEnd) {
      throw new InvalidRangeError(
        `Row range is empty: rowStart=${rowStart} > rowEnd=${rowEnd} (worksheet has ${dimension.rowCount} row(s))`,
      );
    }
    if (columnStart > columnEnd) {
      throw new InvalidRangeError(
        `Column range is empty: columnStart=${columnStart} > columnEnd=${columnEnd} (worksheet has ${dimension.columnCount} column(s))`,
      );
    }

    return { rowStart, rowEnd, columnStart, columnEnd };
  }

  private start(name: string, value: number | undefined): number {
    if (value === undefined) return 1;
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidRangeError(`${name} must be an integer >= 1, got ${value}`);
    }
    return value;
  }

  private end(name: string, value: number | undefined, bound: number): number {
    if (value === undefined || value <= 0) return bound;
    if (!Number.isInteger(value)) {
      throw new InvalidRangeError(`${name} must be an integer, got ${value}`);
    }
    return Math.min(value, bound);
  }
}
