export const projectConfigSchema = {
  type: 'object',
  properties: {
    strict: { type: 'boolean' },
    duplicates: {
      type: 'string',
      enum: ['reject', 'last-wins'],
    },
    format: {
      type: 'string',
      enum: ['list', 'map', 'nested'],
    },
    reporter: {
      type: 'string',
      enum: ['text', 'json', 'junit', 'github'],
    },
    schema: { type: 'string', minLength: 1 },
    booleans: {
      type: 'array',
      items: { type: 'string' },
      minItems: 1,
    },
  },
  additionalProperties: false,
} as const
