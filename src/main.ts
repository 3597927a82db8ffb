#!/usr/bin/env node
/**
 * Entry point - describes the type descriptors given on the command line
 * e.g. `column-meta "numeric(12,3)" "int[]" "myschema.geometry"`
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/app.config';
import { ColumnFormatService } from './column/column-format.service';
import { getLogLevels } from './common/logging.utils';

/**
 * Bootstrap a NestJS application context and print the metadata of each descriptor
 */
async function bootstrap() {
  const logger = new Logger('column-meta');
  const descriptors = process.argv.slice(2);

  if (descriptors.length === 0) {
    logger.error('Usage: column-meta <type descriptor>...');
    process.exit(2);
  }

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(process.env.LOG_LEVEL),
    });
    // Switch to the validated log level once configuration has loaded
    const { logLevel } = app.get(ConfigService).getOrThrow<AppConfig>('app');
    app.useLogger(getLogLevels(logLevel));

    const columnFormats = app.get(ColumnFormatService);

    const summaries = columnFormats.describeColumns(
      descriptors.map((typeName, index) => ({ name: `column_${index + 1}`, typeName, optional: true })),
    );
    for (const summary of summaries) {
      process.stdout.write(`${JSON.stringify(summary)}\n`);
    }

    await app.close();
  } catch (error) {
    logger.error('Failed to describe column types');
    console.error(error); // Log full error to console before exit
    process.exit(1);
  }
}

void bootstrap();
