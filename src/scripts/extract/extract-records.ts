#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

import { AppModule } from '@/app.module';
import type { ExtractionConfig } from '@/config/extraction.config';
import { StderrLogger } from '@/infra/logging/stderr.logger';
import {
  ExtractOptionsDto,
  toExtractionRequest,
} from '@/modules/extraction/application/dto/extract-options.dto';
import { ExtractionService } from '@/modules/extraction/application/services/extraction.service';
import { recordToObject } from '@/modules/extraction/domain/cell-value';
import { createReport, type ExtractionReport } from '@/modules/extraction/domain/extraction-report';
import { parseArgs, USAGE } from '@/scripts/extract/cli-args';
import { openWriter } from '@/scripts/extract/line-writer';

const stderrLogger = new StderrLogger();
Logger.overrideLogger(stderrLogger);
const logger = new Logger('ExtractRecords');

function logSummary(report: ExtractionReport) {
  const emitted = report.files.reduce((sum, file) => sum + file.records, 0);
  const failed = report.files.filter((file) => file.status === 'failed').length;

  logger.log('═══════════════════════════════════════════════');
  logger.log(`✅ ${emitted} record(s) from ${report.files.length - failed}/${report.files.length} file(s)`);
  for (const file of report.files) {
    logger.log(`   ${file.file} [${file.sheet ?? '-'}]: ${file.records} record(s), ${file.status}`);
  }

  if (report.warnings.length > 0) {
    logger.warn(`⚠️  ${report.warnings.length} warning(s):`);
    for (const warning of report.warnings) {
      const { file, type, ...details } = warning;
      logger.warn(`   [${type}] ${file} ${JSON.stringify(details)}`);
    }
  }

  if (report.failures.length > 0) {
    logger.error(`❌ ${report.failures.length} file(s) skipped:`);
    for (const failure of report.failures) {
      logger.error(`   [${failure.code}] ${failure.file}: ${failure.reason}`);
    }
  }
  logger.log('═══════════════════════════════════════════════');
}

async function run(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || args.paths.length === 0) {
    process.stderr.write(`${USAGE}\n`);
    return args.help ? 0 : 1;
  }

  const ctx = await NestFactory.createApplicationContext(AppModule, { logger: stderrLogger });

  try {
    const config = ctx.get(ConfigService).getOrThrow<ExtractionConfig>('extraction');
    stderrLogger.setLogLevels(config.logLevels);
    const dto = plainToInstance(ExtractOptionsDto, {
      ...args,
      dateFormat: args.dateFormat ?? config.dateFormat,
      readTolerant: args.readTolerant ?? config.readTolerant,
    });

    const errors = validateSync(dto);
    if (errors.length > 0) {
      for (const error of errors) {
        logger.error(`Invalid option ${error.property}: ${Object.values(error.constraints ?? {}).join('; ')}`);
      }
      return 1;
    }

    const service = ctx.get(ExtractionService, { strict: false });
    const report = createReport();
    const writer = openWriter(dto.output);

    try {
      for (const { record } of service.extract(toExtractionRequest(dto), report)) {
        if (!writer.isOpen()) break;
        writer.write(JSON.stringify(recordToObject(record)));
      }
    } finally {
      writer.close();
    }

    logSummary(report);
    if (report.files.every((file) => file.status === 'failed')) return 1;
    return process.exitCode === 1 ? 1 : 0;
  } finally {
    await ctx.close();
  }
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error(`❌ Fatal error: ${error instanceof Error ? error.stack : String(error)}`);
    process.exit(1);
  });
