/**
 * JSON Schema (draft-07) for schema-registry configuration files.
 */

const IDENTIFIER = '^(?:r#)?[A-Za-z_$][A-Za-z0-9_$]*$';

export const REGISTRY_CONFIG_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'https://fieldmend.invalid/registry-config.json',
  type: 'object',
  additionalProperties: false,
  required: ['schemas'],
  properties: {
    schemas: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['tag', 'requiredFields'],
        properties: {
          tag: { type: 'string', minLength: 1, pattern: '\\S' },
          requiredFields: {
            type: 'array',
            items: {
              type: 'object',
              additionalProperties: false,
              required: ['name', 'defaultValue'],
              properties: {
                name: { type: 'string', pattern: IDENTIFIER },
                defaultValue: { type: 'string', minLength: 1 },
              },
            },
          },
          corruptionMerge: {
            type: 'object',
            additionalProperties: false,
            required: ['injectedField', 'openFragment', 'closeFragment'],
            properties: {
              injectedField: {
                type: 'object',
                additionalProperties: false,
                required: ['name', 'value'],
                properties: {
                  name: { type: 'string', pattern: IDENTIFIER },
                  value: { type: 'string', minLength: 1 },
                },
              },
              openFragment: { type: 'string', minLength: 1 },
              closeFragment: { type: 'string', minLength: 1 },
            },
          },
        },
      },
    },
    declarationKeywords: {
      type: 'array',
      items: { type: 'string', pattern: IDENTIFIER },
    },
    extensions: {
      type: 'array',
      minItems: 1,
      items: { type: 'string', pattern: '^\\.[\\w.-]+$' },
    },
    indentUnit: { type: 'string', pattern: '^[ \\t]+$' },
  },
} as const;
