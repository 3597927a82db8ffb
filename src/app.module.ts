import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import catalogConfig from './config/catalog.config';
import { ColumnModule } from './column/column.module';

/**
 * Root application module
 * Module order matters: Config → Column
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [appConfig, catalogConfig],
    }),

    ColumnModule,      // Type registry and column-format adapters
  ],
})
export class AppModule {}
