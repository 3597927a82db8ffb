/**
 * Verbose SQL spellings to the short names the catalog uses
 * Anything not listed is already canonical (or unknown) and passes through
 */
const TYPE_NAME_ALIASES = new Map<string, string>(Object.entries({
  'bigint': 'int8',
  'bit varying': 'varbit',
  'boolean': 'bool',
  'character': 'bpchar',
  'character varying': 'varchar',
  'decimal': 'numeric',
  'double precision': 'float8',
  'int': 'int4',
  'integer': 'int4',
  'real': 'float4',
  'smallint': 'int2',
  'time with time zone': 'timetz',
  'time without time zone': 'time',
  'timestamp with time zone': 'timestamptz',
  'timestamp without time zone': 'timestamp',
}));

// Field-qualified intervals are all the interval type, e.g. "interval year to month", "interval second"
const INTERVAL_FIELDS_PATTERN = /^interval (?:year|month|day|hour|minute|second)(?: to (?:month|hour|minute|second))?$/;

/**
 * Marker prepended to a normalized name when the column is an array
 * Same convention the catalog uses for array type names (int4 -> _int4)
 */
export const ARRAY_MARKER = '_';

/**
 * Maps a type name to its catalog-canonical short name
 * Never throws; unrecognized names are returned unchanged
 */
export type TypeNameNormalizer = (typeName: string) => string;

export const normalizeTypeName: TypeNameNormalizer = (typeName) => {
  if (INTERVAL_FIELDS_PATTERN.test(typeName)) {
    return 'interval';
  }
  return TYPE_NAME_ALIASES.get(typeName) ?? typeName;
};
