import { Logger } from '@nestjs/common';
import { ParseError } from '../common/errors';
import { ARRAY_MARKER, normalizeTypeName } from '../common/type-names';
import type { TypeNameNormalizer } from '../common/type-names';

const logger = new Logger('TypeDescriptorParser');

// e.g. "text", "character varying(255)", "numeric(12,3)", "geometry(MultiPolygon,4326)",
// "timestamp (12) with time zone", "int[]", "myschema.geometry", "_int4"
// Only the first parenthesized group after the base token holds modifiers; the suffix never holds parentheses
const TYPE_PATTERN = /^(?<schema>[^.(]+\.)?(?<full>(?<base>[^(\[]+)(?:\((?<mod>.+)\))?(?<suffix>[^()]*?))(?<array>\[\])?$/;
const MODIFIER_SEPARATOR = /\s*,\s*/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export interface TypeDescriptorFields {
  schema?: string;
  baseType: string;
  fullType: string;
  normalizedName: string;
  isArray: boolean;
  length?: number;
  scale?: number;
  modifiers: string[];
  nullable: boolean;
}

/**
 * Structured type information for one replicated column
 * Frozen on construction
 */
export class TypeDescriptor {
  /** Schema of the type without the trailing '.', when qualified */
  readonly schema?: string;
  /** Type name without modifiers, including trailing words such as "with time zone" */
  readonly baseType: string;
  /** Type name including the original modifier text */
  readonly fullType: string;
  /** Catalog short name, prefixed with the array marker for arrays */
  readonly normalizedName: string;
  readonly isArray: boolean;
  readonly length?: number;
  readonly scale?: number;
  readonly modifiers: readonly string[];
  readonly nullable: boolean;

  constructor(fields: TypeDescriptorFields) {
    this.schema = fields.schema;
    this.baseType = fields.baseType;
    this.fullType = fields.fullType;
    this.normalizedName = fields.normalizedName;
    this.isArray = fields.isArray;
    this.length = fields.length;
    this.scale = fields.scale;
    this.modifiers = Object.freeze([...fields.modifiers]);
    this.nullable = fields.nullable;
    Object.freeze(this);
  }

  get schemaPrefix(): string {
    return this.schema !== undefined ? `${this.schema}.` : '';
  }

  get baseTypeWithSchema(): string {
    return this.schemaPrefix + this.baseType;
  }

  get fullTypeWithSchema(): string {
    return this.schemaPrefix + this.fullType;
  }

  /**
   * Normalized name of the element type: the normalized name itself for scalars
   */
  get elementTypeName(): string {
    return this.isArray ? this.normalizedName.slice(ARRAY_MARKER.length) : this.normalizedName;
  }
}

export interface ParseTypeDescriptorOptions {
  /** Only used for error reporting */
  columnName: string;
  nullable: boolean;
  normalize?: TypeNameNormalizer;
}

/**
 * Parses a raw type descriptor as emitted by the replication stream
 *
 * Modifiers map to length and scale by position only: token 0 is the length and
 * token 1 the scale when they are integers. For spatial types this means
 * `geometry(MultiPolygon,4326)` has no length and a scale of 4326. Consumers
 * depend on that, so it is kept as is.
 *
 * @throws ParseError when the descriptor does not match the grammar
 */
export function parseTypeDescriptor(raw: string, options: ParseTypeDescriptorOptions): TypeDescriptor {
  const { columnName, nullable, normalize = normalizeTypeName } = options;

  const groups = TYPE_PATTERN.exec(raw)?.groups;
  if (!groups) {
    throw parseFailure(columnName, raw);
  }

  const schemaGroup: string | undefined = groups.schema;
  const modifierGroup: string | undefined = groups.mod;
  const suffixGroup: string | undefined = groups.suffix;
  const arrayGroup: string | undefined = groups.array;

  let baseType = groups.base.trim();
  let fullType = groups.full;
  let isArray = arrayGroup !== undefined;

  const suffix = suffixGroup?.trim() ?? '';
  if (suffix) {
    baseType = `${baseType} ${suffix}`;
  }

  // Older plugins spell int4[] as _int4
  if (baseType.startsWith(ARRAY_MARKER)) {
    baseType = baseType.slice(ARRAY_MARKER.length);
    fullType = fullType.trimStart().slice(ARRAY_MARKER.length);
    isArray = true;
  }

  if (!baseType) {
    throw parseFailure(columnName, raw);
  }

  const modifiers = modifierGroup !== undefined
    ? modifierGroup.split(MODIFIER_SEPARATOR).map(token => token.trim())
    : [];

  const normalizedName = isArray
    ? ARRAY_MARKER + normalize(baseType)
    : normalize(baseType);

  return new TypeDescriptor({
    schema: schemaGroup?.slice(0, -1),
    baseType,
    fullType,
    normalizedName,
    isArray,
    length: parseModifierInteger(modifiers[0]),
    scale: parseModifierInteger(modifiers[1]),
    modifiers,
    nullable,
  });
}

/**
 * Integer value of a modifier token, or undefined when it is not a 32-bit integer literal
 */
function parseModifierInteger(token: string | undefined): number | undefined {
  if (token === undefined || !INTEGER_PATTERN.test(token)) {
    return undefined;
  }
  const value = Number(token);
  if (value < INT32_MIN || value > INT32_MAX) {
    return undefined;
  }
  // "-0" is plain zero
  return value === 0 ? 0 : value;
}

function parseFailure(columnName: string, raw: string): ParseError {
  logger.error(`Failed to parse column type for ${columnName} '${raw}'`);
  return new ParseError(columnName, raw);
}
