/**
 * Tests for the JSON Schema → zod compiler
 *
 * Compiled schemas are exercised through Model so that the assertions are
 * on the reported error entries.
 */

import { describe, it, expect } from 'vitest';
import { ModelGenerationError } from './errors.js';
import { Model } from './model.js';
import { describeExpected, mergeSchemas, SchemaCompiler } from './schema-compiler.js';

type Schema = Record<string, unknown>;

function compileModel(schema: Schema, options: { strict?: boolean; components?: Schema } = {}): Model {
  const compiler = new SchemaCompiler({ ...options.components, Subject: schema }, { strict: options.strict ?? false });
  return new Model('Subject', compiler.component('Subject'), schema);
}

const stringField: Schema = {
  type: 'object',
  required: ['f'],
  properties: { f: { type: 'string' } },
};

describe('SchemaCompiler', () => {
  describe.each([false, true])('required string field (strict: %s)', strict => {
    const model = compileModel(stringField, { strict });

    it('should accept a string', () => {
      expect(model.validate({ f: 'abc' })).toEqual({ valid: true, data: { f: 'abc' } });
    });

    it('should report a missing field with the parent as input', () => {
      expect(model.validate({})).toEqual({
        valid: false,
        errors: [{ type: 'missing', loc: ['f'], msg: 'Field required', input: {} }],
      });
    });

    it('should not coerce numbers to strings', () => {
      expect(model.validate({ f: 123 })).toEqual({
        valid: false,
        errors: [{ type: 'string_type', loc: ['f'], msg: 'Input should be a valid string', input: 123 }],
      });
    });
  });

  describe('unknown fields', () => {
    it('should drop them in lax mode', () => {
      expect(compileModel(stringField).validate({ f: 'a', extra: 1 })).toEqual({ valid: true, data: { f: 'a' } });
    });

    it('should forbid them in strict mode', () => {
      expect(compileModel(stringField, { strict: true }).validate({ f: 'a', extra: 1 })).toEqual({
        valid: false,
        errors: [{ type: 'extra_forbidden', loc: ['extra'], msg: 'Extra inputs are not permitted', input: 1 }],
      });
    });

    it('should forbid them when additionalProperties is false', () => {
      const model = compileModel({ ...stringField, additionalProperties: false });

      expect(model.validate({ f: 'a', extra: 1 })).toMatchObject({
        valid: false,
        errors: [{ type: 'extra_forbidden', loc: ['extra'] }],
      });
    });

    it('should keep them when additionalProperties is true, even in strict mode', () => {
      const model = compileModel({ ...stringField, additionalProperties: true }, { strict: true });

      expect(model.validate({ f: 'a', extra: 1 })).toEqual({ valid: true, data: { f: 'a', extra: 1 } });
    });

    it.each([false, true])('should keep every key of a free-form object (strict: %s)', strict => {
      const model = compileModel(
        { type: 'object', required: ['meta'], properties: { meta: { type: 'object' } } },
        { strict }
      );

      expect(model.validate({ meta: { a: 1, nested: { b: [2] } } })).toEqual({
        valid: true,
        data: { meta: { a: 1, nested: { b: [2] } } },
      });
      expect(model.validate({ meta: 'text' })).toMatchObject({ valid: false, errors: [{ type: 'model_type', loc: ['meta'] }] });
    });

    it('should close a free-form object only with additionalProperties false', () => {
      const model = compileModel({ type: 'object', additionalProperties: false });

      expect(model.validate({})).toEqual({ valid: true, data: {} });
      expect(model.validate({ a: 1 })).toMatchObject({ valid: false, errors: [{ type: 'extra_forbidden', loc: ['a'] }] });
    });

    it('should validate them against an additionalProperties schema', () => {
      const model = compileModel({ type: 'object', additionalProperties: { type: 'integer' } });

      expect(model.validate({ a: '1' })).toEqual({ valid: true, data: { a: 1 } });
      expect(model.validate({ a: 'one' })).toMatchObject({ valid: false, errors: [{ type: 'int_parsing', loc: ['a'] }] });
    });
  });

  describe('optional fields', () => {
    const model = compileModel({
      type: 'object',
      properties: {
        note: { type: 'string' },
        strength: { type: 'string', enum: ['mild', 'medium', 'strong'], default: 'medium' },
      },
    });

    it('should accept null and absent values', () => {
      expect(model.validate({ note: null })).toEqual({ valid: true, data: { note: null, strength: 'medium' } });
      expect(model.validate({})).toEqual({ valid: true, data: { strength: 'medium' } });
    });

    it('should report enum violations with the allowed values', () => {
      expect(model.validate({ strength: 'extreme' })).toEqual({
        valid: false,
        errors: [
          {
            type: 'enum',
            loc: ['strength'],
            msg: "Input should be 'mild', 'medium' or 'strong'",
            input: 'extreme',
            ctx: { expected: "'mild', 'medium' or 'strong'" },
          },
        ],
      });
    });
  });

  describe('scalar coercion', () => {
    const schema: Schema = {
      type: 'object',
      properties: {
        count: { type: 'integer' },
        ratio: { type: 'number' },
        flag: { type: 'boolean' },
      },
    };

    it('should coerce strings in lax mode', () => {
      expect(compileModel(schema).validate({ count: '5', ratio: '0.25', flag: 'yes' })).toEqual({
        valid: true,
        data: { count: 5, ratio: 0.25, flag: true },
      });
    });

    it('should not coerce in strict mode', () => {
      const result = compileModel(schema, { strict: true }).validate({ count: '5', ratio: '0.25', flag: 'yes' });

      expect(result).toEqual({
        valid: false,
        errors: [
          { type: 'int_type', loc: ['count'], msg: 'Input should be a valid integer', input: '5' },
          { type: 'float_type', loc: ['ratio'], msg: 'Input should be a valid number', input: '0.25' },
          { type: 'bool_type', loc: ['flag'], msg: 'Input should be a valid boolean', input: 'yes' },
        ],
      });
    });

    it('should reject fractional integers in lax mode', () => {
      expect(compileModel(schema).validate({ count: 2.5 })).toMatchObject({
        valid: false,
        errors: [{ type: 'int_from_float', loc: ['count'], input: 2.5 }],
      });
    });
  });

  describe('constraints', () => {
    it('should check string length and pattern', () => {
      const model = compileModel({
        type: 'object',
        properties: { id: { type: 'string', minLength: 9, maxLength: 9, pattern: '^[0-9]{7}-[0-9]$' } },
      });

      expect(model.validate({ id: '1234567-8' })).toEqual({ valid: true, data: { id: '1234567-8' } });
      expect(model.validate({ id: '123' })).toEqual({
        valid: false,
        errors: [
          {
            type: 'string_too_short',
            loc: ['id'],
            msg: 'String should have at least 9 characters',
            input: '123',
            ctx: { min_length: 9 },
          },
        ],
      });
      expect(model.validate({ id: '123456789' })).toEqual({
        valid: false,
        errors: [
          {
            type: 'string_pattern_mismatch',
            loc: ['id'],
            msg: "String should match pattern '^[0-9]{7}-[0-9]$'",
            input: '123456789',
            ctx: { pattern: '^[0-9]{7}-[0-9]$' },
          },
        ],
      });
    });

    it('should check inclusive and exclusive bounds', () => {
      const model = compileModel({
        type: 'object',
        properties: {
          lat: { type: 'number', minimum: -90, maximum: 90 },
          amount: { type: 'number', minimum: 0, exclusiveMinimum: true },
          score: { type: 'number', exclusiveMaximum: 10 },
        },
      });

      expect(model.validate({ lat: 90, amount: 0.01, score: 9.9 }).valid).toBe(true);
      expect(model.validate({ lat: 100, amount: 0, score: 10 })).toEqual({
        valid: false,
        errors: [
          { type: 'less_than_equal', loc: ['lat'], msg: 'Input should be less than or equal to 90', input: 100, ctx: { le: 90 } },
          { type: 'greater_than', loc: ['amount'], msg: 'Input should be greater than 0', input: 0, ctx: { gt: 0 } },
          { type: 'less_than', loc: ['score'], msg: 'Input should be less than 10', input: 10, ctx: { lt: 10 } },
        ],
      });
    });

    it('should check multipleOf', () => {
      const model = compileModel({ type: 'object', properties: { n: { type: 'integer', multipleOf: 5 } } });

      expect(model.validate({ n: 15 }).valid).toBe(true);
      expect(model.validate({ n: 12 })).toMatchObject({
        valid: false,
        errors: [{ type: 'multiple_of', msg: 'Input should be a multiple of 5', ctx: { multiple_of: 5 } }],
      });
    });

    it('should check array length', () => {
      const model = compileModel({
        type: 'object',
        properties: { days: { type: 'array', minItems: 1, items: { type: 'number' } } },
      });

      expect(model.validate({ days: [] })).toEqual({
        valid: false,
        errors: [
          {
            type: 'too_short',
            loc: ['days'],
            msg: 'List should have at least 1 item after validation, not 0',
            input: [],
            ctx: { field_type: 'List', min_length: 1, actual_length: 0 },
          },
        ],
      });
    });

    it('should validate string formats', () => {
      const model = compileModel({ type: 'object', properties: { email: { type: 'string', format: 'email' } } });

      expect(model.validate({ email: 'nobody' })).toMatchObject({
        valid: false,
        errors: [{ type: 'value_error', loc: ['email'], msg: 'value is not a valid email address' }],
      });
    });
  });

  describe('containers', () => {
    it('should report non-objects as model_type', () => {
      expect(compileModel(stringField).validate('text')).toEqual({
        valid: false,
        errors: [
          {
            type: 'model_type',
            loc: [],
            msg: 'Input should be a valid dictionary or object to extract fields from',
            input: 'text',
          },
        ],
      });
    });

    it('should report non-arrays as list_type with nested locations', () => {
      const model = compileModel({ type: 'object', properties: { tags: { type: 'array', items: { type: 'string' } } } });

      expect(model.validate({ tags: 'a,b' })).toEqual({
        valid: false,
        errors: [{ type: 'list_type', loc: ['tags'], msg: 'Input should be a valid list', input: 'a,b' }],
      });
      expect(model.validate({ tags: ['a', 2] })).toMatchObject({
        valid: false,
        errors: [{ type: 'string_type', loc: ['tags', 1], input: 2 }],
      });
    });
  });

  describe('composition', () => {
    it('should follow $ref, including recursive references', () => {
      const node: Schema = {
        type: 'object',
        required: ['value'],
        properties: {
          value: { type: 'integer' },
          children: { type: 'array', items: { $ref: '#/components/schemas/Subject' } },
        },
      };
      const model = compileModel(node);

      expect(model.validate({ value: 1, children: [{ value: '2', children: [] }] })).toEqual({
        valid: true,
        data: { value: 1, children: [{ value: 2, children: [] }] },
      });
      expect(model.validate({ value: 1, children: [{ value: 'x' }] })).toMatchObject({
        valid: false,
        errors: [{ type: 'int_parsing', loc: ['children', 0, 'value'], input: 'x' }],
      });
    });

    it('should merge allOf members', () => {
      const model = compileModel(
        {
          allOf: [
            { $ref: '#/components/schemas/Base' },
            { type: 'object', required: ['name'], properties: { name: { type: 'string' } } },
          ],
        },
        { components: { Base: { type: 'object', required: ['id'], properties: { id: { type: 'integer' } } } } }
      );

      expect(model.validate({ id: 1, name: 'Rex' })).toEqual({ valid: true, data: { id: 1, name: 'Rex' } });
      expect(model.validate({})).toEqual({
        valid: false,
        errors: [
          { type: 'missing', loc: ['id'], msg: 'Field required', input: {} },
          { type: 'missing', loc: ['name'], msg: 'Field required', input: {} },
        ],
      });
    });

    it('should report every failed anyOf branch', () => {
      const model = compileModel({
        type: 'object',
        properties: { v: { anyOf: [{ type: 'string' }, { type: 'integer' }] } },
      });

      expect(model.validate({ v: 'x' })).toEqual({ valid: true, data: { v: 'x' } });
      expect(model.validate({ v: true })).toEqual({
        valid: false,
        errors: [
          { type: 'string_type', loc: ['v'], msg: 'Input should be a valid string', input: true },
          { type: 'int_type', loc: ['v'], msg: 'Input should be a valid integer', input: true },
        ],
      });
    });

    it('should accept null for nullable schemas', () => {
      const model = compileModel({
        type: 'object',
        required: ['a', 'b'],
        properties: { a: { type: 'string', nullable: true }, b: { type: ['integer', 'null'] } },
      });

      expect(model.validate({ a: null, b: null })).toEqual({ valid: true, data: { a: null, b: null } });
    });
  });

  describe('temporal fields', () => {
    const schema: Schema = {
      type: 'object',
      properties: { day: { type: 'string', format: 'date' }, at: { type: 'string', format: 'date-time' } },
    };

    it('should coerce timestamps in lax mode', () => {
      const result = compileModel(schema).validate({ day: '1757548800', at: '2025-09-10 12:00:00Z' });

      expect(result).toEqual({
        valid: true,
        data: { day: '2025-09-11', at: new Date('2025-09-10T12:00:00.000Z') },
      });
    });

    it('should reject timestamps beyond year 9999', () => {
      expect(compileModel(schema).validate({ at: 1e20 })).toEqual({
        valid: false,
        errors: [
          {
            type: 'datetime_parsing',
            loc: ['at'],
            msg: 'Input should be a valid datetime, timestamp out of range',
            input: 1e20,
            ctx: { error: 'timestamp out of range' },
          },
        ],
      });
    });

    it('should report strict temporal failures in the common shape', () => {
      const result = compileModel(schema, { strict: true }).validate({ day: '1757548800', at: '2025-09-10 12:00:00Z' });

      expect(result).toEqual({
        valid: false,
        errors: [
          {
            type: 'date_from_datetime_parsing',
            loc: ['day'],
            msg: "Input should be a valid date, in RFC 3339 'full-date' format",
            input: '1757548800',
            ctx: { error: 'input is not of form YYYY-MM-DD' },
          },
          {
            type: 'datetime_from_date_parsing',
            loc: ['at'],
            msg: 'Input should be a valid datetime, in RFC 3339 format',
            input: '2025-09-10 12:00:00Z',
            ctx: { error: 'input does not follow RFC 3339' },
          },
        ],
      });
    });
  });

  describe('generation errors', () => {
    it('should reject unresolved references', () => {
      expect(() => compileModel({ $ref: '#/components/schemas/Missing' })).toThrow(
        'Unresolved schema reference #/components/schemas/Missing at #/components/schemas/Subject'
      );
    });

    it('should reject references outside components/schemas', () => {
      expect(() => compileModel({ $ref: 'other.json#/Pet' })).toThrow(ModelGenerationError);
    });

    it('should reject invalid patterns', () => {
      expect(() =>
        compileModel({ type: 'object', properties: { p: { type: 'string', pattern: '(' } } })
      ).toThrow('Invalid pattern at #/components/schemas/Subject/properties/p');
    });
  });
});

describe('mergeSchemas', () => {
  it('should combine properties and required lists', () => {
    const merged = mergeSchemas(
      { type: 'object', required: ['a'], properties: { a: { type: 'string' } } },
      { type: 'array', required: ['a', 'b'], properties: { b: { type: 'integer' } } }
    );

    expect(merged).toEqual({
      type: 'object',
      required: ['a', 'b'],
      properties: { a: { type: 'string' }, b: { type: 'integer' } },
    });
  });
});

describe('describeExpected', () => {
  it('should join alternatives', () => {
    expect(describeExpected(['a'])).toBe("'a'");
    expect(describeExpected([1, 2])).toBe('1 or 2');
    expect(describeExpected(['x', 'y', 'z'])).toBe("'x', 'y' or 'z'");
  });
});
