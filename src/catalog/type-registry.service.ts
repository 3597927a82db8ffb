import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as pgTypes from 'pg-types';
import { UnknownTypeError } from '../common/errors';
import { normalizeTypeName } from '../common/type-names';
import type { CatalogConfiguration } from '../config/catalog.types';

/**
 * Type name to OID catalog
 * Builtin types come from pg-types; extension types are added from the catalog configuration
 */
@Injectable()
export class TypeRegistryService {
  private readonly logger = new Logger(TypeRegistryService.name);
  private readonly oids = new Map<string, number>();

  constructor(configService: ConfigService) {
    for (const [name, oid] of Object.entries(pgTypes.builtins)) {
      if (typeof oid === 'number') {
        this.oids.set(name.toLowerCase(), oid);
      }
    }
    const builtinCount = this.oids.size;

    const catalog = configService.get<CatalogConfiguration>('catalog');
    // Catalog names are stored lower-cased, the way format_type reports them
    for (const { name, oid } of catalog?.types ?? []) {
      const typeName = name.toLowerCase();
      const existing = this.oids.get(typeName);
      if (existing !== undefined && existing !== oid) {
        throw new Error(`Custom type '${name}' (OID ${oid}) conflicts with builtin OID ${existing}`);
      }
      this.oids.set(typeName, oid);
    }

    this.logger.log(`Type registry initialized with ${builtinCount} builtin and ${this.oids.size - builtinCount} custom types`);
  }

  get size(): number {
    return this.oids.size;
  }

  has(typeName: string): boolean {
    return this.lookup(typeName) !== undefined;
  }

  /**
   * OID for a type name, accepting both normalized and verbose spellings
   * @throws UnknownTypeError when the catalog has no such type
   */
  resolve(typeName: string): number {
    const oid = this.lookup(typeName);
    if (oid === undefined) {
      throw new UnknownTypeError(typeName);
    }
    return oid;
  }

  private lookup(typeName: string): number | undefined {
    return this.oids.get(typeName) ?? this.oids.get(normalizeTypeName(typeName));
  }
}
