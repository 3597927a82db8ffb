import type { TypeDescriptor } from './type-descriptor';

/**
 * OID of anyarray, the catalog's generic array pseudo-type
 * Reported as the OID type of every array column; the element OID is reported separately
 */
export const ANYARRAY_OID = 2277;

/**
 * What an OID resolver gets to see of a column
 * descriptor is absent when the column format carries no type text
 */
export interface ColumnTypeContext {
  columnName: string;
  descriptor?: TypeDescriptor;
}

/**
 * Format-specific OID resolution, supplied by the column-format adapter
 * Resolves the element type for arrays; may throw UnknownTypeError
 */
export interface OidResolver {
  resolveOid(column: ColumnTypeContext): number;
}

/**
 * Parser used by a column to build its descriptor
 */
export type DescriptorParser = (
  raw: string,
  options: { columnName: string; nullable: boolean },
) => TypeDescriptor;

/**
 * Summary of a column once its type information has been resolved
 */
export interface ColumnTypeSummary {
  name: string;
  optional: boolean;
  oid: number;
  componentOid?: number;
  metadata?: TypeDescriptor;
}
