/**
 * Field-level validation error shapes
 *
 * The same entry shape is produced for contract-declared constraints and
 * for the strict temporal pre-validators, so callers always receive one
 * uniform error payload.
 */

export type Location = Array<string | number>;

export interface ValidationErrorEntry {
  type: string;
  loc: Location;
  msg: string;
  input: unknown;
  ctx?: Record<string, unknown>;
}

/**
 * Error payload rendered by the transport for 422 responses
 */
export interface HTTPValidationErrorBody {
  detail: ValidationErrorEntry[];
}

export type ModelValidationResult =
  | { valid: true; data: unknown }
  | { valid: false; errors: ValidationErrorEntry[] };

/**
 * Issue raised by a value parser before any constraint is checked
 */
export interface ValueIssue {
  type: string;
  message: string;
  ctx?: Record<string, unknown>;
}

export type ValueParseResult<T> =
  | { valid: true; value: T }
  | { valid: false; issue: ValueIssue };
