import { Logger } from '@nestjs/common';
import { parseTypeDescriptor, TypeDescriptor } from './type-descriptor';
import { ParseError } from '../common/errors';

describe('parseTypeDescriptor', () => {
  const parse = (raw: string, nullable = true) =>
    parseTypeDescriptor(raw, { columnName: 'col', nullable });

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('simple types', () => {
    it('should parse a plain type name', () => {
      const descriptor = parse('text');

      expect(descriptor).toBeInstanceOf(TypeDescriptor);
      expect(descriptor.schema).toBeUndefined();
      expect(descriptor.baseType).toBe('text');
      expect(descriptor.fullType).toBe('text');
      expect(descriptor.normalizedName).toBe('text');
      expect(descriptor.isArray).toBe(false);
      expect(descriptor.modifiers).toEqual([]);
      expect(descriptor.length).toBeUndefined();
      expect(descriptor.scale).toBeUndefined();
    });

    it('should carry the nullability of the column', () => {
      expect(parse('text', true).nullable).toBe(true);
      expect(parse('text', false).nullable).toBe(false);
    });
  });

  describe('modifiers', () => {
    it('should read length from a single modifier', () => {
      const descriptor = parse('character varying(255)');

      expect(descriptor.baseType).toBe('character varying');
      expect(descriptor.fullType).toBe('character varying(255)');
      expect(descriptor.normalizedName).toBe('varchar');
      expect(descriptor.modifiers).toEqual(['255']);
      expect(descriptor.length).toBe(255);
      expect(descriptor.scale).toBeUndefined();
    });

    it('should read length and scale from numeric modifiers', () => {
      const descriptor = parse('numeric(12,3)');

      expect(descriptor.baseType).toBe('numeric');
      expect(descriptor.fullType).toBe('numeric(12,3)');
      expect(descriptor.length).toBe(12);
      expect(descriptor.scale).toBe(3);
      expect(descriptor.isArray).toBe(false);
    });

    it('should trim modifier tokens', () => {
      const descriptor = parse('numeric( 10 , 2 )');

      expect(descriptor.modifiers).toEqual(['10', '2']);
      expect(descriptor.length).toBe(10);
      expect(descriptor.scale).toBe(2);
    });

    it('should take scale from the SRID of spatial types', () => {
      const descriptor = parse('geometry(MultiPolygon,4326)');

      expect(descriptor.baseType).toBe('geometry');
      expect(descriptor.fullType).toBe('geometry(MultiPolygon,4326)');
      expect(descriptor.modifiers).toEqual(['MultiPolygon', '4326']);
      expect(descriptor.length).toBeUndefined();
      expect(descriptor.scale).toBe(4326);
    });

    it('should leave length unset for values outside the 32-bit range', () => {
      const descriptor = parse('numeric(2147483648,1)');

      expect(descriptor.length).toBeUndefined();
      expect(descriptor.scale).toBe(1);
    });

    it('should accept signed integers', () => {
      const descriptor = parse('numeric(5,-2)');

      expect(descriptor.length).toBe(5);
      expect(descriptor.scale).toBe(-2);
    });

    it('should read a negative zero modifier as zero', () => {
      const descriptor = parse('numeric(-0,+0)');

      expect(Object.is(descriptor.length, 0)).toBe(true);
      expect(Object.is(descriptor.scale, 0)).toBe(true);
      expect(descriptor.modifiers).toEqual(['-0', '+0']);
    });

    it('should keep enum-like modifiers without a length', () => {
      const descriptor = parse('mood(happy, sad)');

      expect(descriptor.modifiers).toEqual(['happy', 'sad']);
      expect(descriptor.length).toBeUndefined();
      expect(descriptor.scale).toBeUndefined();
    });
  });

  describe('multi-word types', () => {
    it('should append the suffix after the modifiers to the base type', () => {
      const descriptor = parse('timestamp (12) with time zone');

      expect(descriptor.baseType).toBe('timestamp with time zone');
      expect(descriptor.fullType).toBe('timestamp (12) with time zone');
      expect(descriptor.normalizedName).toBe('timestamptz');
      expect(descriptor.length).toBe(12);
      expect(descriptor.modifiers).toEqual(['12']);
    });

    it('should normalize verbose names without modifiers', () => {
      expect(parse('timestamp without time zone').normalizedName).toBe('timestamp');
      expect(parse('double precision').normalizedName).toBe('float8');
      expect(parse('integer').normalizedName).toBe('int4');
    });
  });

  describe('arrays', () => {
    it('should detect the [] suffix', () => {
      const descriptor = parse('int[]');

      expect(descriptor.baseType).toBe('int');
      expect(descriptor.fullType).toBe('int');
      expect(descriptor.isArray).toBe(true);
      expect(descriptor.normalizedName).toBe('_int4');
      expect(descriptor.elementTypeName).toBe('int4');
    });

    it('should keep modifiers of array types', () => {
      const descriptor = parse('numeric(10,2)[]');

      expect(descriptor.fullType).toBe('numeric(10,2)');
      expect(descriptor.isArray).toBe(true);
      expect(descriptor.normalizedName).toBe('_numeric');
      expect(descriptor.length).toBe(10);
      expect(descriptor.scale).toBe(2);
    });

    it('should strip the legacy underscore prefix', () => {
      const descriptor = parse('_int4');

      expect(descriptor.baseType).toBe('int4');
      expect(descriptor.fullType).toBe('int4');
      expect(descriptor.isArray).toBe(true);
      expect(descriptor.normalizedName).toBe('_int4');
    });

    it('should treat a legacy prefix with [] as a single array marker', () => {
      const descriptor = parse('_varchar(20)[]');

      expect(descriptor.baseType).toBe('varchar');
      expect(descriptor.fullType).toBe('varchar(20)');
      expect(descriptor.isArray).toBe(true);
      expect(descriptor.normalizedName).toBe('_varchar');
      expect(descriptor.length).toBe(20);
    });

    it('should use the normalized name as element name for scalars', () => {
      expect(parse('bigint').elementTypeName).toBe('int8');
    });
  });

  describe('schema qualification', () => {
    it('should split the schema without its separator', () => {
      const descriptor = parse('myschema.geometry');

      expect(descriptor.schema).toBe('myschema');
      expect(descriptor.baseType).toBe('geometry');
      expect(descriptor.fullType).toBe('geometry');
      expect(descriptor.schemaPrefix).toBe('myschema.');
      expect(descriptor.baseTypeWithSchema).toBe('myschema.geometry');
      expect(descriptor.fullTypeWithSchema).toBe('myschema.geometry');
    });

    it('should combine schema, modifiers and array suffix', () => {
      const descriptor = parse('public.geometry(Point,4326)[]');

      expect(descriptor.schema).toBe('public');
      expect(descriptor.fullTypeWithSchema).toBe('public.geometry(Point,4326)');
      expect(descriptor.isArray).toBe(true);
      expect(descriptor.normalizedName).toBe('_geometry');
      expect(descriptor.scale).toBe(4326);
    });

    it('should have an empty prefix without schema', () => {
      const descriptor = parse('numeric(12,3)');

      expect(descriptor.schemaPrefix).toBe('');
      expect(descriptor.fullTypeWithSchema).toBe('numeric(12,3)');
    });
  });

  describe('custom normalizer', () => {
    it('should use the injected normalizer', () => {
      const normalize = jest.fn((name: string) => name.toUpperCase());
      const descriptor = parseTypeDescriptor('citext[]', { columnName: 'col', nullable: true, normalize });

      expect(normalize).toHaveBeenCalledWith('citext');
      expect(descriptor.normalizedName).toBe('_CITEXT');
    });
  });

  describe('immutability', () => {
    it('should freeze the descriptor and its modifiers', () => {
      const descriptor = parse('numeric(12,3)');

      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.modifiers)).toBe(true);
    });
  });

  describe('failures', () => {
    it('should throw ParseError for an unbalanced parenthesis', () => {
      expect(() => parse('not a valid type (')).toThrow(ParseError);
    });

    it('should report the column and the descriptor', () => {
      let caught: unknown;
      try {
        parseTypeDescriptor('not a valid type (', { columnName: 'price', nullable: false });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      expect(caught).toMatchObject({
        columnName: 'price',
        rawDescriptor: 'not a valid type (',
        message: "Failed to parse column type 'not a valid type (' for column price",
      });
    });

    it('should log the failure', () => {
      expect(() => parse('(12)')).toThrow(ParseError);
      expect(Logger.prototype.error).toHaveBeenCalledWith("Failed to parse column type for col '(12)'");
    });

    it('should reject empty descriptors', () => {
      expect(() => parse('')).toThrow(ParseError);
      expect(() => parse(' (12)')).toThrow(ParseError);
      expect(() => parse('_')).toThrow(ParseError);
    });
  });
});
