/**
 * TypeScript declarations for a generated model module
 *
 * Why: Generated models live in memory; the emitted declarations are an
 * inspection artifact (see loadModels with `cleanup: false`) and a typing
 * aid for handler authors.
 */

import { COMPONENT_SCHEMA_PREFIX } from './constants.js';
import { asArray, asRecord, asString, asStringArray, isRecord } from './validation-utils.js';

export interface ModelSourceInput {
  id: string;
  strict: boolean;
  schemas: ReadonlyMap<string, Readonly<Record<string, unknown>>>;
}

export interface EmitOptions {
  /** Multi-line, indented declarations instead of one line per model */
  format?: boolean;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function toTypeName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_$]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/**
 * True when `|` or `&` appears outside of braces, brackets or generics
 */
function hasTopLevelOperator(type: string): boolean {
  let depth = 0;
  for (const char of type) {
    if (char === '{' || char === '<' || char === '(') depth++;
    else if (char === '}' || char === '>' || char === ')') depth--;
    else if (depth === 0 && (char === '|' || char === '&')) return true;
  }
  return false;
}

class TypeWriter {
  constructor(private readonly format: boolean) {}

  private newline(depth: number): string {
    return this.format ? `\n${'  '.repeat(depth)}` : ' ';
  }

  typeOf(schema: unknown, depth: number): string {
    const node = asRecord(schema);
    const base = this.baseType(node, depth);
    const nullable = node.nullable === true || asStringArray(node.type).includes('null');
    return nullable && base !== 'unknown' ? `${base} | null` : base;
  }

  private baseType(node: Readonly<Record<string, unknown>>, depth: number): string {
    const ref = asString(node.$ref);
    if (ref !== undefined) {
      return toTypeName(ref.startsWith(COMPONENT_SCHEMA_PREFIX) ? ref.slice(COMPONENT_SCHEMA_PREFIX.length) : ref);
    }

    const allOf = asArray(node.allOf);
    if (allOf.length > 0) {
      return allOf.map(member => this.wrap(this.typeOf(member, depth))).join(' & ');
    }

    const alternatives = [...asArray(node.anyOf), ...asArray(node.oneOf)];
    if (alternatives.length > 0) {
      return alternatives.map(member => this.wrap(this.typeOf(member, depth))).join(' | ');
    }

    if (Array.isArray(node.enum)) {
      return node.enum.map(value => JSON.stringify(value)).join(' | ');
    }

    const types = typeof node.type === 'string' ? [node.type] : asStringArray(node.type);
    const declared = types.filter(type => type !== 'null');
    if (declared.length === 0) {
      return isRecord(node.properties) ? this.objectBody(node, depth) : 'unknown';
    }
    return declared.map(type => this.scalarType(node, type, depth)).join(' | ');
  }

  private scalarType(node: Readonly<Record<string, unknown>>, type: string, depth: number): string {
    switch (type) {
      case 'string':
        return node.format === 'date-time' ? 'Date' : 'string';
      case 'number':
      case 'integer':
        return 'number';
      case 'boolean':
        return 'boolean';
      case 'array':
        return `Array<${node.items === undefined ? 'unknown' : this.typeOf(node.items, depth)}>`;
      case 'object':
        return this.objectBody(node, depth);
      default:
        return 'unknown';
    }
  }

  private wrap(type: string): string {
    return hasTopLevelOperator(type) ? `(${type})` : type;
  }

  objectBody(node: Readonly<Record<string, unknown>>, depth: number): string {
    const required = new Set(asStringArray(node.required));
    const members: string[] = [];

    for (const [name, propSchema] of Object.entries(asRecord(node.properties))) {
      const optional = required.has(name) ? '' : '?';
      const type = this.typeOf(propSchema, depth + 1);
      const description = asString(asRecord(propSchema).description);
      const doc = this.format && description ? `/** ${description.replace(/\*\//g, '*\\/')} */${this.newline(depth + 1)}` : '';
      const nullable = optional && !type.endsWith('| null') && type !== 'unknown' ? ' | null' : '';
      members.push(`${doc}${propertyKey(name)}${optional}: ${type}${nullable};`);
    }

    const additional = node.additionalProperties;
    if (additional === true || (additional === undefined && !isRecord(node.properties))) {
      members.push('[key: string]: unknown;');
    } else if (isRecord(additional)) {
      members.push(`[key: string]: ${this.typeOf(additional, depth + 1)};`);
    }

    if (members.length === 0) return '{}';
    const inner = this.newline(depth + 1);
    return `{${inner}${members.join(inner)}${this.newline(depth)}}`;
  }
}

function isObjectSchema(schema: Readonly<Record<string, unknown>>): boolean {
  if (schema.allOf || schema.anyOf || schema.oneOf || schema.$ref) return false;
  return schema.type === 'object' || (schema.type === undefined && isRecord(schema.properties));
}

/**
 * Render every model of a module as TypeScript declarations
 */
export function emitModelSource(module: ModelSourceInput, options: EmitOptions = {}): string {
  const format = options.format ?? false;
  const writer = new TypeWriter(format);
  const mode = module.strict ? 'strict' : 'lax';
  const declarations: string[] = [`// Models ${module.id} (${mode} validation)`];

  for (const [name, schema] of module.schemas) {
    const typeName = toTypeName(name);
    const description = asString(schema.description);
    const doc = format && description ? `/** ${description.replace(/\*\//g, '*\\/')} */\n` : '';

    if (isObjectSchema(schema) && schema.nullable !== true) {
      declarations.push(`${doc}export interface ${typeName} ${writer.objectBody(schema, 0)}`);
    } else {
      declarations.push(`${doc}export type ${typeName} = ${writer.typeOf(schema, 0)};`);
    }
  }

  return `${declarations.join(format ? '\n\n' : '\n')}\n`;
}
