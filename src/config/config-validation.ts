import { validateSync } from 'class-validator';
import type { ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

/**
 * Validate one configuration section, e.g. 'app' or a single 'catalog.types.<name>' entry
 * String values from env or YAML are converted to the declared property types first
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  section: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    logger.error(`Configuration validation failed for ${section}`);
    throw new Error(`Invalid configuration for ${section}: ${describeErrors(section, errors)}`);
  }

  return validatedConfig;
}

/**
 * One entry per failed property, keyed by its full config path
 * e.g. "catalog.types.geometry.oid (oid must not be less than 1)"
 */
function describeErrors(section: string, errors: ValidationError[]): string {
  return errors
    .map(error => `${section}.${error.property} (${Object.values(error.constraints ?? {}).join(', ')})`)
    .join('; ');
}
