import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';
import type { CatalogConfiguration, CustomTypeDefinition, YamlCatalogFile } from './catalog.types';

const logger = new Logger('CatalogConfig');

/**
 * One custom type entry
 * Validated using class-validator decorators
 */
export class CustomTypeConfig implements CustomTypeDefinition {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  oid!: number;
}

/**
 * Loads custom type definitions from the YAML catalog file
 * No TYPE_CATALOG_PATH means builtin types only; a path that cannot be read fails fast
 */
export default registerAs('catalog', (): CatalogConfiguration => {
  const catalogPath = process.env.TYPE_CATALOG_PATH;
  if (!catalogPath) {
    return { types: [] };
  }

  let yamlData: unknown;
  try {
    logger.log(`Loading custom types from: ${catalogPath}`);
    yamlData = load(readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      logger.error(`Type catalog not found at ${catalogPath}`);
      throw new Error(`Type catalog not found: ${catalogPath}. Please ensure the file exists or unset TYPE_CATALOG_PATH.`);
    }
    logger.error('Failed to load type catalog');
    throw error;
  }

  if (!isCatalogFile(yamlData) || !yamlData.types) {
    throw new Error('Invalid type catalog: must contain a "types" section');
  }

  const types = Object.entries(yamlData.types).map(([name, oid]) =>
    validateConfig({ name, oid }, `catalog.types.${name}`, CustomTypeConfig),
  );

  logger.log(`Loaded ${types.length} custom types: ${types.map(t => t.name).join(', ')}`);
  return { path: catalogPath, types };
});

function isCatalogFile(data: unknown): data is YamlCatalogFile {
  if (typeof data !== 'object' || data === null) {
    return false;
  }
  const types: unknown = Reflect.get(data, 'types');
  return types === undefined || (typeof types === 'object' && types !== null && !Array.isArray(types));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
