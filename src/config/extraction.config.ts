import { registerAs } from '@nestjs/config';
import type { LogLevel } from '@nestjs/common';

export interface ExtractionConfig {
  dateFormat?: string;
  readTolerant: boolean;
  logLevels: LogLevel[];
}

const LOG_LEVELS: readonly LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export function parseLogLevels(raw: string | undefined): LogLevel[] {
  const levels = (raw ?? '')
    .split(',')
    .map((level) => level.trim())
    .filter(isLogLevel);
  return levels.length ? levels : ['error', 'warn', 'log'];
}

export function parseFlag(raw: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((raw ?? '').trim().toLowerCase());
}

export const extractionConfig = registerAs(
  'extraction',
  (): ExtractionConfig => ({
    dateFormat: process.env.EXTRACT_DATE_FORMAT?.trim() || undefined,
    readTolerant: parseFlag(process.env.EXTRACT_READ_TOLERANT),
    logLevels: parseLogLevels(process.env.EXTRACT_LOG_LEVELS),
  }),
);
