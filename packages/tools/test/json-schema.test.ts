/**
 * Unit tests for zod to JSON Schema conversion
 */

import { z } from 'zod';
import { toInputSchema, zodToJsonSchema } from '../src/index.js';

describe('zodToJsonSchema', () => {
  it('should convert scalar types with descriptions and bounds', () => {
    expect(zodToJsonSchema(z.string().max(45).describe('Title'))).toEqual({
      type: 'string',
      maxLength: 45,
      description: 'Title',
    });
    expect(zodToJsonSchema(z.number().int().min(1))).toEqual({ type: 'integer', minimum: 1 });
    expect(zodToJsonSchema(z.boolean())).toEqual({ type: 'boolean' });
    expect(zodToJsonSchema(z.enum(['a', 'b']))).toEqual({ type: 'string', enum: ['a', 'b'] });
    expect(zodToJsonSchema(z.literal('fixed'))).toEqual({ enum: ['fixed'] });
  });

  it('should keep the description of an optional wrapper', () => {
    expect(zodToJsonSchema(z.string().optional().describe('Initial text'))).toEqual({
      type: 'string',
      description: 'Initial text',
    });
    expect(zodToJsonSchema(z.string().describe('Inner').optional())).toEqual({
      type: 'string',
      description: 'Inner',
    });
  });

  it('should convert arrays of objects', () => {
    const fields = z
      .array(
        z.object({
          label: z.string(),
          long: z.boolean().default(false),
        })
      )
      .min(1)
      .max(5);

    expect(zodToJsonSchema(fields)).toEqual({
      type: 'array',
      items: {
        type: 'object',
        properties: {
          label: { type: 'string' },
          long: { type: 'boolean' },
        },
        required: ['label'],
      },
      minItems: 1,
      maxItems: 5,
    });
  });

  it('should mark nullable values', () => {
    expect(zodToJsonSchema(z.string().nullable())).toEqual({ type: 'string', nullable: true });
  });
});

describe('toInputSchema', () => {
  it('should omit required when every field is optional', () => {
    expect(toInputSchema(z.object({ query: z.string().optional() }))).toEqual({
      type: 'object',
      properties: { query: { type: 'string' } },
    });
  });

  it('should report an empty object for non-object inputs', () => {
    expect(toInputSchema(z.string())).toEqual({ type: 'object', properties: {} });
  });
});
