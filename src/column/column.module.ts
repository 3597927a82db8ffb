import { Module } from '@nestjs/common';
import { TypeRegistryService } from '../catalog/type-registry.service';
import { ColumnFormatService } from './column-format.service';

/**
 * Column module provides the type registry and the column-format adapters
 */
@Module({
  providers: [
    TypeRegistryService,
    ColumnFormatService,
  ],
  exports: [
    TypeRegistryService,
    ColumnFormatService,
  ],
})
export class ColumnModule {}
