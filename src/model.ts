/**
 * Validating model types
 *
 * A Model pairs a compiled zod schema with the component name and the
 * JSON Schema it was generated from. `validate()` never throws; it reports
 * failures as ValidationErrorEntry lists in the same shape whether the
 * failure came from a declared constraint, a strict temporal check or the
 * object structure itself.
 */

import { z } from 'zod';
import type { CompiledSchema } from './schema-compiler.js';
import type { Location, ModelValidationResult, ValidationErrorEntry } from './types/validation.js';
import { isRecord } from './validation-utils.js';

export class Model {
  constructor(
    readonly name: string,
    readonly schema: CompiledSchema,
    readonly jsonSchema: Readonly<Record<string, unknown>>
  ) {}

  /**
   * Validate and coerce a value. `location` prefixes every error `loc`.
   */
  validate(input: unknown, location: Location = []): ModelValidationResult {
    if (input === undefined) {
      return {
        valid: false,
        errors: [{ type: 'missing', loc: location, msg: 'Field required', input: null }],
      };
    }

    const result = this.schema.safeParse(input);
    if (result.success) {
      return { valid: true, data: result.data };
    }
    return { valid: false, errors: formatIssues(result.error.issues, input, location) };
  }
}

/**
 * Model for operations without a request body. Accepts an absent body or
 * an empty object.
 */
export class EmptyBodyModel extends Model {
  constructor(name: string) {
    super(name, z.object({}).strict(), { type: 'object', properties: {} });
  }

  override validate(input: unknown, location: Location = []): ModelValidationResult {
    return input === undefined ? { valid: true, data: {} } : super.validate(input, location);
  }
}

// ---------------------------------------------------------------------------
// Issue formatting

function valueAt(root: unknown, path: readonly (string | number)[]): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

function readParams(issue: z.ZodIssue): { type?: string; ctx?: Record<string, unknown> } {
  if (issue.code !== z.ZodIssueCode.custom || !isRecord(issue.params)) return {};
  const { type, ctx } = issue.params;
  return {
    type: typeof type === 'string' ? type : undefined,
    ctx: isRecord(ctx) ? ctx : undefined,
  };
}

function entry(
  type: string,
  loc: Location,
  msg: string,
  input: unknown,
  ctx?: Record<string, unknown>
): ValidationErrorEntry {
  return ctx ? { type, loc, msg, input, ctx } : { type, loc, msg, input };
}

function containerTypeError(expected: string): { type: string; msg: string } {
  switch (expected) {
    case 'object':
      return { type: 'model_type', msg: 'Input should be a valid dictionary or object to extract fields from' };
    case 'array':
      return { type: 'list_type', msg: 'Input should be a valid list' };
    default:
      return { type: `${expected}_type`, msg: `Input should be a valid ${expected}` };
  }
}

export function formatIssues(
  issues: readonly z.ZodIssue[],
  root: unknown,
  location: Location = []
): ValidationErrorEntry[] {
  const entries: ValidationErrorEntry[] = [];

  for (const issue of issues) {
    const loc = [...location, ...issue.path];
    const input = valueAt(root, issue.path);

    switch (issue.code) {
      case z.ZodIssueCode.custom: {
        const { type, ctx } = readParams(issue);
        if (type === 'missing') {
          entries.push(entry(type, loc, issue.message, valueAt(root, issue.path.slice(0, -1))));
        } else {
          entries.push(entry(type ?? 'value_error', loc, issue.message, input, ctx));
        }
        break;
      }
      case z.ZodIssueCode.unrecognized_keys:
        for (const key of issue.keys) {
          entries.push(entry('extra_forbidden', [...loc, key], 'Extra inputs are not permitted', valueAt(input, [key])));
        }
        break;
      case z.ZodIssueCode.invalid_type:
        if (issue.received === z.ZodParsedType.undefined) {
          entries.push(entry('missing', loc, 'Field required', valueAt(root, issue.path.slice(0, -1))));
        } else {
          const { type, msg } = containerTypeError(issue.expected);
          entries.push(entry(type, loc, msg, input));
        }
        break;
      case z.ZodIssueCode.invalid_union:
        for (const unionError of issue.unionErrors) {
          entries.push(...formatIssues(unionError.issues, root, location));
        }
        break;
      default:
        entries.push(entry(issue.code, loc, issue.message, input));
    }
  }

  return entries;
}
