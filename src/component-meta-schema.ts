/**
 * Meta-schema for `components/schemas` entries
 *
 * Covers the OpenAPI 3.0 schema object subset the model compiler
 * understands (boolean `exclusiveMinimum`, `nullable`, no `$id`).
 * Unknown keywords and `x-` extensions are allowed.
 */

const nonNegativeInteger = { type: 'integer', minimum: 0 };
const schemaArray = { type: 'array', items: { $ref: '#' }, minItems: 1 };
const typeName = {
  type: 'string',
  enum: ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null'],
};

export const componentMetaSchema = {
  type: 'object',
  properties: {
    type: {
      anyOf: [typeName, { type: 'array', items: typeName, minItems: 1 }],
    },
    format: { type: 'string' },
    title: { type: 'string' },
    description: { type: 'string' },
    enum: { type: 'array', minItems: 1 },
    $ref: { type: 'string' },
    properties: {
      type: 'object',
      additionalProperties: { $ref: '#' },
    },
    required: {
      type: 'array',
      items: { type: 'string' },
    },
    additionalProperties: {
      anyOf: [{ type: 'boolean' }, { $ref: '#' }],
    },
    items: { $ref: '#' },
    allOf: schemaArray,
    anyOf: schemaArray,
    oneOf: schemaArray,
    nullable: { type: 'boolean' },
    minLength: nonNegativeInteger,
    maxLength: nonNegativeInteger,
    pattern: { type: 'string' },
    minItems: nonNegativeInteger,
    maxItems: nonNegativeInteger,
    minimum: { type: 'number' },
    maximum: { type: 'number' },
    exclusiveMinimum: { type: ['boolean', 'number'] },
    exclusiveMaximum: { type: ['boolean', 'number'] },
    multipleOf: { type: 'number', exclusiveMinimum: 0 },
    deprecated: { type: 'boolean' },
    readOnly: { type: 'boolean' },
    writeOnly: { type: 'boolean' },
  },
};
