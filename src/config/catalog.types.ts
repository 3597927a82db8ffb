// Types for the custom type catalog loaded from YAML

/**
 * Structure of the catalog YAML file
 * Maps type names to the OIDs the source database assigned them
 */
export interface YamlCatalogFile {
  types?: Record<string, unknown>;
}

/**
 * A type that is not a builtin, e.g. one created by an extension
 */
export interface CustomTypeDefinition {
  name: string;
  oid: number;
}

export interface CatalogConfiguration {
  path?: string;
  types: CustomTypeDefinition[];
}
