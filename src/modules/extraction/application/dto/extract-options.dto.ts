import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Min,
  Validate,
  ValidateIf,
  ValidatorConstraint,
  type ValidatorConstraintInterface,
} from 'class-validator';
import type { ExtractionRequest } from '@/modules/extraction/application/services/extraction.service';

@ValidatorConstraint({ name: 'isRegExpSource', async: false })
export class IsRegExpSource implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    if (typeof value !== 'string') return false;
    try {
      new RegExp(value, 'i');
      return true;
    } catch {
      return false;
    }
  }

  defaultMessage(): string {
    return '$property must be a valid regular expression';
  }
}

export class ExtractOptionsDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  paths!: string[];

  @IsOptional()
  @ValidateIf((o: ExtractOptionsDto) => typeof o.sheet !== 'string')
  @IsInt()
  @Min(1)
  sheet?: number | string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  headers?: string[];

  @IsOptional()
  @IsBoolean()
  firstRowIsData?: boolean;

  @IsOptional()
  @IsBoolean()
  useDisplayText?: boolean;

  @IsOptional()
  @IsString()
  @Validate(IsRegExpSource)
  dateFormat?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  rowStart?: number;

  @IsOptional()
  @IsInt()
  rowEnd?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  columnStart?: number;

  @IsOptional()
  @IsInt()
  columnEnd?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  headerRow?: number;

  @IsOptional()
  @IsBoolean()
  readTolerant?: boolean;

  @IsOptional()
  @IsBoolean()
  strictHeaders?: boolean;

  @IsOptional()
  @IsBoolean()
  skipBlankRows?: boolean;

  @IsOptional()
  @IsString()
  output?: string;
}

export function toExtractionRequest(dto: ExtractOptionsDto): ExtractionRequest {
  return {
    paths: dto.paths,
    sheet: dto.sheet,
    headers: dto.headers,
    firstRowIsData: dto.firstRowIsData,
    useDisplayText: dto.useDisplayText,
    dateFormat: dto.dateFormat ? new RegExp(dto.dateFormat, 'i') : undefined,
    rowStart: dto.rowStart,
    rowEnd: dto.rowEnd,
    columnStart: dto.columnStart,
    columnEnd: dto.columnEnd,
    headerRow: dto.headerRow,
    readTolerant: dto.readTolerant,
    strictHeaders: dto.strictHeaders,
    skipBlankRows: dto.skipBlankRows,
  };
}
