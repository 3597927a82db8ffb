import { Logger } from '@nestjs/common';
import { ContractViolationError } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import { parseTypeDescriptor } from './type-descriptor';
import type { TypeDescriptor } from './type-descriptor';
import { ANYARRAY_OID } from './types';
import type { DescriptorParser, OidResolver } from './types';

/**
 * Cache cell for the parsed descriptor
 * Moves from unparsed to parsed at most once and never back
 */
export type MetadataState =
  | { state: 'unparsed' }
  | { state: 'parsed'; descriptor: TypeDescriptor };

export interface ColumnMetadataOptions {
  name: string;
  rawDescriptor: string;
  nullable: boolean;
  /**
   * Whether the column format delivers type text that can be parsed
   * When false only getName, isOptional and getOidType may be called
   */
  metadataObtainable: boolean;
  oidResolver: OidResolver;
  parser?: DescriptorParser;
}

/**
 * Type information of one column within one change event
 * The raw descriptor is parsed on first use and the result is kept for the lifetime of the instance
 */
export class ColumnMetadataLazyLoader {
  private readonly logger = new Logger(ColumnMetadataLazyLoader.name);
  private readonly name: string;
  private readonly rawDescriptor: string;
  private readonly nullable: boolean;
  private readonly metadataObtainable: boolean;
  private readonly oidResolver: OidResolver;
  private readonly parser: DescriptorParser;
  private metadata: MetadataState = { state: 'unparsed' };

  constructor(options: ColumnMetadataOptions) {
    this.name = options.name;
    this.rawDescriptor = options.rawDescriptor;
    this.nullable = options.nullable;
    this.metadataObtainable = options.metadataObtainable;
    this.oidResolver = options.oidResolver;
    this.parser = options.parser ?? parseTypeDescriptor;
  }

  getName(): string {
    return this.name;
  }

  /**
   * True if the column has no NOT NULL constraint
   */
  isOptional(): boolean {
    return this.nullable;
  }

  hasMetadata(): boolean {
    return this.metadataObtainable;
  }

  /**
   * Parsed type descriptor of the column
   * @throws ContractViolationError when the column format carries no type text
   */
  getMetadata(): TypeDescriptor {
    return this.loadMetadata();
  }

  /**
   * OID of the column type; ANYARRAY_OID for array columns
   */
  getOidType(): number {
    if (!this.metadataObtainable) {
      return this.oidResolver.resolveOid({ columnName: this.name });
    }

    const descriptor = this.loadMetadata();
    return descriptor.isArray
      ? ANYARRAY_OID
      : this.oidResolver.resolveOid({ columnName: this.name, descriptor });
  }

  /**
   * OID of the element type of an array column
   * @throws ContractViolationError when the column is not an array
   */
  getComponentOidType(): number {
    const descriptor = this.loadMetadata();
    if (!descriptor.isArray) {
      throw new ContractViolationError(this.name, `Column type '${descriptor.fullTypeWithSchema}' is not an array`);
    }
    return this.oidResolver.resolveOid({ columnName: this.name, descriptor });
  }

  private loadMetadata(): TypeDescriptor {
    if (!this.metadataObtainable) {
      throw new ContractViolationError(this.name, 'Type metadata not available');
    }

    if (this.metadata.state === 'parsed') {
      return this.metadata.descriptor;
    }

    const descriptor = this.parser(this.rawDescriptor, {
      columnName: this.name,
      nullable: this.nullable,
    });
    this.metadata = { state: 'parsed', descriptor };
    this.logger.debug(`Parsed type of column ${this.name}: ${truncateForLog(descriptor)}`);
    return descriptor;
  }
}
