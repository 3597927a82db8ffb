import { ContractViolationError } from '../common/errors';
import type { TypeRegistryService } from '../catalog/type-registry.service';
import type { ColumnTypeContext, OidResolver } from './types';

/**
 * Resolves OIDs from the parsed type name
 * Used by formats that send the type as text, so the descriptor is always available
 */
export class TypeNameOidResolver implements OidResolver {
  constructor(private readonly registry: TypeRegistryService) {}

  resolveOid({ columnName, descriptor }: ColumnTypeContext): number {
    if (!descriptor) {
      throw new ContractViolationError(columnName, 'Type name resolution requires type metadata');
    }
    return this.registry.resolve(descriptor.elementTypeName);
  }
}

/**
 * Returns the OID the wire format sent along with the column
 */
export class WireOidResolver implements OidResolver {
  constructor(private readonly oid: number) {}

  resolveOid(): number {
    return this.oid;
  }
}
