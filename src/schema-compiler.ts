/**
 * JSON Schema → zod compiler for contract component schemas
 *
 * Every scalar goes through a value parser (see primitives.ts and
 * temporal.ts) so that type and constraint failures surface as custom zod
 * issues carrying the error `type` and `ctx` reported to clients.
 * Structural failures (missing fields, unknown keys, wrong container type)
 * come from zod itself and are mapped in model.ts.
 */

import { z } from 'zod';
import { COMPONENT_SCHEMA_PREFIX } from './constants.js';
import { ModelGenerationError } from './errors.js';
import {
  checkStringFormat,
  parseBoolean,
  parseInteger,
  parseNumber,
  parseString,
  type ValueParser,
} from './primitives.js';
import { parseLaxDate, parseLaxDateTime, parseStrictDate, parseStrictDateTime } from './temporal.js';
import type { ValueIssue } from './types/validation.js';
import { asArray, asRecord, asString, asStringArray, isRecord } from './validation-utils.js';

export type CompiledSchema = z.ZodType<unknown>;

export interface SchemaCompilerOptions {
  /** Reject unknown fields and disable scalar coercion */
  strict: boolean;
}

type SchemaNode = Record<string, unknown>;

/**
 * Params attached to every custom issue raised by the compiler
 */
export interface IssueParams {
  type: string;
  ctx?: Record<string, unknown>;
}

function addIssue(ctx: z.RefinementCtx, issue: ValueIssue, fatal: boolean = false): void {
  const params: IssueParams = issue.ctx ? { type: issue.type, ctx: issue.ctx } : { type: issue.type };
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, params, fatal });
}

function fromParser(parse: ValueParser): CompiledSchema {
  return z.unknown().transform((value, ctx) => {
    const result = parse(value);
    if (!result.valid) {
      // fatal so that unions report every failed branch
      addIssue(ctx, result.issue, true);
      return z.NEVER;
    }
    return result.value;
  });
}

/**
 * Wrap a field so that an absent value reports `missing` instead of a type error
 */
function requiredField(field: CompiledSchema): CompiledSchema {
  return z
    .unknown()
    .superRefine((value, ctx) => {
      if (value === undefined) {
        addIssue(ctx, { type: 'missing', message: 'Field required' }, true);
      }
    })
    .pipe(field);
}

function plural(count: number): string {
  return count === 1 ? '' : 's';
}

function describeLiteral(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : JSON.stringify(value);
}

export function describeExpected(values: readonly unknown[]): string {
  const described = values.map(describeLiteral);
  if (described.length <= 1) return described.join('');
  return `${described.slice(0, -1).join(', ')} or ${described[described.length - 1]}`;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return false;
}

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function isNullable(node: SchemaNode): boolean {
  return node.nullable === true || (Array.isArray(node.type) && node.type.includes('null'));
}

/**
 * Merge allOf members: first declaration of a scalar keyword wins,
 * properties and required lists are combined
 */
export function mergeSchemas(target: SchemaNode, source: Readonly<SchemaNode>): SchemaNode {
  for (const [key, value] of Object.entries(source)) {
    if (key === 'properties') {
      const merged: SchemaNode = { ...asRecord(target.properties) };
      for (const [name, propSchema] of Object.entries(asRecord(value))) {
        const existing = merged[name];
        merged[name] = isRecord(existing) && isRecord(propSchema)
          ? mergeSchemas({ ...existing }, propSchema)
          : existing ?? propSchema;
      }
      target.properties = merged;
    } else if (key === 'required') {
      target.required = Array.from(new Set([...asStringArray(target.required), ...asStringArray(value)]));
    } else if (target[key] === undefined) {
      target[key] = value;
    }
  }
  return target;
}

export class SchemaCompiler {
  private readonly compiled = new Map<string, CompiledSchema>();

  constructor(
    private readonly components: Readonly<Record<string, unknown>>,
    private readonly options: SchemaCompilerOptions
  ) {}

  /**
   * Compiled schema for a named component, compiled once
   */
  component(name: string): CompiledSchema {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    const schema = this.components[name];
    if (!isRecord(schema)) {
      throw new ModelGenerationError(`Unresolved schema reference: ${COMPONENT_SCHEMA_PREFIX}${name}`, { name });
    }
    const compiled = this.compile(schema, `${COMPONENT_SCHEMA_PREFIX}${name}`);
    this.compiled.set(name, compiled);
    return compiled;
  }

  compile(schema: unknown, pointer: string): CompiledSchema {
    if (!isRecord(schema)) {
      throw new ModelGenerationError(`Schema at ${pointer} is not an object`, { pointer });
    }
    const compiled = this.compileNode(schema, pointer);
    return isNullable(schema) ? compiled.nullable() : compiled;
  }

  private compileNode(node: SchemaNode, pointer: string): CompiledSchema {
    const ref = asString(node.$ref);
    if (ref !== undefined) {
      const target = this.refTarget(ref, pointer);
      return z.lazy(() => this.component(target));
    }

    const allOf = asArray(node.allOf);
    if (allOf.length > 0) {
      return this.compileNode(this.mergeAllOf(node, allOf, pointer), pointer);
    }

    const alternatives = [...asArray(node.anyOf), ...asArray(node.oneOf)];
    if (alternatives.length > 0) {
      return this.union(alternatives.map((member, index) => this.compile(member, `${pointer}/anyOf/${index}`)));
    }

    const types = this.declaredTypes(node);
    if (types.length > 1) {
      return this.union(types.map(type => this.compileTyped({ ...node, type }, type, pointer)));
    }
    if (types.length === 1) {
      return this.compileTyped(node, types[0], pointer);
    }
    if (isRecord(node.properties)) {
      return this.compileObject(node, pointer);
    }
    if (Array.isArray(node.enum)) {
      return fromParser(this.withEnum<unknown>(value => ({ valid: true, value }), node.enum));
    }
    return z.unknown();
  }

  private compileTyped(node: SchemaNode, type: string, pointer: string): CompiledSchema {
    switch (type) {
      case 'string':
        return fromParser(this.withEnum(this.stringParser(node, pointer), node.enum));
      case 'number':
        return fromParser(this.withEnum(this.numberParser(node, false), node.enum));
      case 'integer':
        return fromParser(this.withEnum(this.numberParser(node, true), node.enum));
      case 'boolean':
        return fromParser(this.withEnum(value => parseBoolean(value, this.options.strict), node.enum));
      case 'array':
        return this.compileArray(node, pointer);
      case 'object':
        return this.compileObject(node, pointer);
      default:
        throw new ModelGenerationError(`Unsupported schema type '${type}' at ${pointer}`, { pointer, type });
    }
  }

  private declaredTypes(node: SchemaNode): string[] {
    if (typeof node.type === 'string') return node.type === 'null' ? [] : [node.type];
    return asStringArray(node.type).filter(type => type !== 'null');
  }

  private refTarget(ref: string, pointer: string): string {
    if (!ref.startsWith(COMPONENT_SCHEMA_PREFIX)) {
      throw new ModelGenerationError(`Unsupported schema reference ${ref} at ${pointer}`, { ref, pointer });
    }
    const target = ref.slice(COMPONENT_SCHEMA_PREFIX.length);
    if (!isRecord(this.components[target])) {
      throw new ModelGenerationError(`Unresolved schema reference ${ref} at ${pointer}`, { ref, pointer });
    }
    return target;
  }

  /**
   * Follow `$ref` chains to the referenced component schema
   */
  private resolve(schema: unknown, pointer: string, seen: Set<string> = new Set()): SchemaNode {
    const node = asRecord(schema);
    const ref = asString(node.$ref);
    if (ref === undefined) return { ...node };

    const target = this.refTarget(ref, pointer);
    if (seen.has(target)) {
      throw new ModelGenerationError(`Circular allOf reference ${ref} at ${pointer}`, { ref, pointer });
    }
    seen.add(target);
    return this.resolve(this.components[target], pointer, seen);
  }

  private mergeAllOf(node: SchemaNode, members: readonly unknown[], pointer: string): SchemaNode {
    const merged: SchemaNode = { ...node };
    delete merged.allOf;
    members.forEach((member, index) => {
      const resolved = this.resolve(member, `${pointer}/allOf/${index}`);
      const nested = asArray(resolved.allOf);
      mergeSchemas(merged, nested.length > 0 ? this.mergeAllOf(resolved, nested, pointer) : resolved);
    });
    return merged;
  }

  private union(options: CompiledSchema[]): CompiledSchema {
    const [first, second, ...rest] = options;
    if (!second) return first;
    return z.union([first, second, ...rest]);
  }

  private withEnum<T>(parse: ValueParser<T>, values: unknown): ValueParser<T> {
    if (!Array.isArray(values)) return parse;

    const expected = describeExpected(values);
    return value => {
      const result = parse(value);
      if (!result.valid) return result;
      if (!values.some(allowed => sameValue(allowed, result.value))) {
        return {
          valid: false,
          issue: { type: 'enum', message: `Input should be ${expected}`, ctx: { expected } },
        };
      }
      return result;
    };
  }

  private stringParser(node: SchemaNode, pointer: string): ValueParser {
    const format = asString(node.format);
    if (format === 'date') {
      return this.options.strict ? parseStrictDate : parseLaxDate;
    }
    if (format === 'date-time') {
      return this.options.strict ? parseStrictDateTime : parseLaxDateTime;
    }

    const minLength = numberOrUndefined(node.minLength);
    const maxLength = numberOrUndefined(node.maxLength);
    const patternSource = asString(node.pattern);
    let pattern: RegExp | undefined;
    if (patternSource !== undefined) {
      try {
        pattern = new RegExp(patternSource);
      } catch (error) {
        throw new ModelGenerationError(`Invalid pattern at ${pointer}`, {
          pointer,
          pattern: patternSource,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return value => {
      const result = parseString(value);
      if (!result.valid) return result;
      const text = result.value;
      const length = Array.from(text).length;

      if (minLength !== undefined && length < minLength) {
        return {
          valid: false,
          issue: {
            type: 'string_too_short',
            message: `String should have at least ${minLength} character${plural(minLength)}`,
            ctx: { min_length: minLength },
          },
        };
      }
      if (maxLength !== undefined && length > maxLength) {
        return {
          valid: false,
          issue: {
            type: 'string_too_long',
            message: `String should have at most ${maxLength} character${plural(maxLength)}`,
            ctx: { max_length: maxLength },
          },
        };
      }
      if (pattern && patternSource !== undefined && !pattern.test(text)) {
        return {
          valid: false,
          issue: {
            type: 'string_pattern_mismatch',
            message: `String should match pattern '${patternSource}'`,
            ctx: { pattern: patternSource },
          },
        };
      }
      const formatIssue = checkStringFormat(text, format);
      if (formatIssue) return { valid: false, issue: formatIssue };
      return result;
    };
  }

  private numberParser(node: SchemaNode, integer: boolean): ValueParser<number> {
    const strict = this.options.strict;
    const bounds = numericBounds(node);
    const multipleOf = numberOrUndefined(node.multipleOf);

    return value => {
      const result = integer ? parseInteger(value, strict) : parseNumber(value, strict);
      if (!result.valid) return result;
      const n = result.value;

      const issue = checkBounds(n, bounds);
      if (issue) return { valid: false, issue };
      if (multipleOf !== undefined && !isMultipleOf(n, multipleOf)) {
        return {
          valid: false,
          issue: {
            type: 'multiple_of',
            message: `Input should be a multiple of ${multipleOf}`,
            ctx: { multiple_of: multipleOf },
          },
        };
      }
      return result;
    };
  }

  private compileArray(node: SchemaNode, pointer: string): CompiledSchema {
    const items = node.items === undefined ? z.unknown() : this.compile(node.items, `${pointer}/items`);
    const minItems = numberOrUndefined(node.minItems);
    const maxItems = numberOrUndefined(node.maxItems);

    return z.array(items).superRefine((list, ctx) => {
      if (minItems !== undefined && list.length < minItems) {
        addIssue(ctx, {
          type: 'too_short',
          message: `List should have at least ${minItems} item${plural(minItems)} after validation, not ${list.length}`,
          ctx: { field_type: 'List', min_length: minItems, actual_length: list.length },
        });
      }
      if (maxItems !== undefined && list.length > maxItems) {
        addIssue(ctx, {
          type: 'too_long',
          message: `List should have at most ${maxItems} item${plural(maxItems)} after validation, not ${list.length}`,
          ctx: { field_type: 'List', max_length: maxItems, actual_length: list.length },
        });
      }
    });
  }

  private compileObject(node: SchemaNode, pointer: string): CompiledSchema {
    const required = new Set(asStringArray(node.required));
    const shape: Record<string, CompiledSchema> = {};

    for (const [key, propSchema] of Object.entries(asRecord(node.properties))) {
      const field = this.compile(propSchema, `${pointer}/properties/${key}`);
      const declared = asRecord(propSchema);

      if (required.has(key)) {
        shape[key] = requiredField(field);
      } else if (declared.default !== undefined) {
        shape[key] = field.nullable().default(declared.default);
      } else {
        shape[key] = field.nullable().optional();
      }
    }

    const object = z.object(shape);
    const additional = node.additionalProperties;
    if (additional === false) {
      return object.strict();
    }
    // without declared properties the object is free-form unless closed explicitly
    if (additional === true || (additional === undefined && !isRecord(node.properties))) {
      return object.passthrough();
    }
    if (isRecord(additional)) {
      return object.catchall(this.compile(additional, `${pointer}/additionalProperties`));
    }
    return this.options.strict ? object.strict() : object.strip();
  }
}

interface NumericBounds {
  ge?: number;
  gt?: number;
  le?: number;
  lt?: number;
}

/**
 * Bounds from OpenAPI 3.0 (boolean exclusive flags) or 3.1 (numeric) keywords
 */
function numericBounds(node: SchemaNode): NumericBounds {
  const bounds: NumericBounds = {};
  const minimum = numberOrUndefined(node.minimum);
  const maximum = numberOrUndefined(node.maximum);

  if (typeof node.exclusiveMinimum === 'number') {
    bounds.gt = node.exclusiveMinimum;
  } else if (minimum !== undefined) {
    if (node.exclusiveMinimum === true) bounds.gt = minimum;
    else bounds.ge = minimum;
  }

  if (typeof node.exclusiveMaximum === 'number') {
    bounds.lt = node.exclusiveMaximum;
  } else if (maximum !== undefined) {
    if (node.exclusiveMaximum === true) bounds.lt = maximum;
    else bounds.le = maximum;
  }

  return bounds;
}

function checkBounds(n: number, bounds: NumericBounds): ValueIssue | undefined {
  if (bounds.ge !== undefined && n < bounds.ge) {
    return { type: 'greater_than_equal', message: `Input should be greater than or equal to ${bounds.ge}`, ctx: { ge: bounds.ge } };
  }
  if (bounds.gt !== undefined && n <= bounds.gt) {
    return { type: 'greater_than', message: `Input should be greater than ${bounds.gt}`, ctx: { gt: bounds.gt } };
  }
  if (bounds.le !== undefined && n > bounds.le) {
    return { type: 'less_than_equal', message: `Input should be less than or equal to ${bounds.le}`, ctx: { le: bounds.le } };
  }
  if (bounds.lt !== undefined && n >= bounds.lt) {
    return { type: 'less_than', message: `Input should be less than ${bounds.lt}`, ctx: { lt: bounds.lt } };
  }
  return undefined;
}

function isMultipleOf(n: number, divisor: number): boolean {
  const quotient = n / divisor;
  return Math.abs(quotient - Math.round(quotient)) < 1e-9;
}
