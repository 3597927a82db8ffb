import { Injectable, Logger } from '@nestjs/common';
import { TypeRegistryService } from '../catalog/type-registry.service';
import { ColumnMetadataLazyLoader } from './column-metadata';
import { TypeNameOidResolver, WireOidResolver } from './oid-resolver';
import type { ColumnTypeSummary } from './types';

/**
 * A column as a replication message describes it
 * Text formats send typeName; binary formats send typeOid and optionally typeName
 */
export interface ReplicatedColumn {
  name: string;
  typeName?: string;
  typeOid?: number;
  optional: boolean;
}

/**
 * Column-format adapters
 * Builds one ColumnMetadataLazyLoader per column per change event, wired with the right OID strategy
 */
@Injectable()
export class ColumnFormatService {
  private readonly logger = new Logger(ColumnFormatService.name);
  private readonly typeNameResolver: TypeNameOidResolver;

  constructor(registry: TypeRegistryService) {
    this.typeNameResolver = new TypeNameOidResolver(registry);
  }

  /**
   * Column from a format that sends the type as text, e.g. "numeric(12,3)"
   */
  fromTypeDescriptor(name: string, rawDescriptor: string, optional: boolean): ColumnMetadataLazyLoader {
    return new ColumnMetadataLazyLoader({
      name,
      rawDescriptor,
      nullable: optional,
      metadataObtainable: true,
      oidResolver: this.typeNameResolver,
    });
  }

  /**
   * Column from a format that sends the type OID
   * Type metadata is only available when the type text is sent as well
   */
  fromWireOid(name: string, oid: number, optional: boolean, rawDescriptor?: string): ColumnMetadataLazyLoader {
    return new ColumnMetadataLazyLoader({
      name,
      rawDescriptor: rawDescriptor ?? '',
      nullable: optional,
      metadataObtainable: rawDescriptor !== undefined,
      oidResolver: new WireOidResolver(oid),
    });
  }

  /**
   * Adapter for a single replicated column, picked by what the message carries
   */
  fromColumn(column: ReplicatedColumn): ColumnMetadataLazyLoader {
    if (column.typeOid !== undefined) {
      return this.fromWireOid(column.name, column.typeOid, column.optional, column.typeName);
    }
    if (column.typeName !== undefined) {
      return this.fromTypeDescriptor(column.name, column.typeName, column.optional);
    }
    throw new Error(`Column ${column.name} carries neither a type name nor a type OID`);
  }

  /**
   * Resolve type information for all columns of one change event
   */
  describeColumns(columns: ReplicatedColumn[]): ColumnTypeSummary[] {
    const summaries = columns.map(column => summarize(this.fromColumn(column)));
    this.logger.debug(`Described ${summaries.length} columns: ${summaries.map(s => s.name).join(', ')}`);
    return summaries;
  }
}

function summarize(column: ColumnMetadataLazyLoader): ColumnTypeSummary {
  const summary: ColumnTypeSummary = {
    name: column.getName(),
    optional: column.isOptional(),
    oid: column.getOidType(),
  };
  if (!column.hasMetadata()) {
    return summary;
  }

  const metadata = column.getMetadata();
  summary.metadata = metadata;
  if (metadata.isArray) {
    summary.componentOid = column.getComponentOidType();
  }
  return summary;
}
