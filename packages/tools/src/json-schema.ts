/**
 * Zod to JSON Schema conversion for model-facing tool listings
 *
 * Covers the schema shapes tool inputs use: objects, strings, numbers,
 * booleans, enums, literals, arrays and the optional/default/nullable
 * wrappers. Anything else becomes an unconstrained schema.
 */

import {
  ZodArray,
  ZodBoolean,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodLiteral,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  ZodString,
  type ZodTypeAny,
} from 'zod';

export interface JsonSchema {
  type?: 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: readonly (string | number | boolean)[];
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  minItems?: number;
  maxItems?: number;
  nullable?: boolean;
}

/** Top-level shape the model API expects for tool input */
export interface JsonObjectSchema extends JsonSchema {
  type: 'object';
  properties: Record<string, JsonSchema>;
}

function withDescription(schema: JsonSchema, description: string | undefined): JsonSchema {
  return description ? { ...schema, description } : schema;
}

export function zodToJsonSchema(schema: ZodTypeAny): JsonSchema {
  const description = schema.description;

  if (schema instanceof ZodOptional || schema instanceof ZodNullable) {
    const inner = zodToJsonSchema(schema.unwrap());
    const nullable = schema instanceof ZodNullable ? { nullable: true } : {};
    return withDescription({ ...inner, ...nullable }, description ?? inner.description);
  }

  if (schema instanceof ZodDefault) {
    const inner = zodToJsonSchema(schema.removeDefault());
    return withDescription(inner, description ?? inner.description);
  }

  if (schema instanceof ZodEffects) {
    const inner = zodToJsonSchema(schema.innerType());
    return withDescription(inner, description ?? inner.description);
  }

  if (schema instanceof ZodObject) {
    return withDescription(objectSchema(schema), description);
  }

  if (schema instanceof ZodString) {
    return withDescription({
      type: 'string',
      ...(schema.minLength !== null ? { minLength: schema.minLength } : {}),
      ...(schema.maxLength !== null ? { maxLength: schema.maxLength } : {}),
    }, description);
  }

  if (schema instanceof ZodNumber) {
    return withDescription({
      type: schema.isInt ? 'integer' : 'number',
      ...(schema.minValue !== null ? { minimum: schema.minValue } : {}),
      ...(schema.maxValue !== null ? { maximum: schema.maxValue } : {}),
    }, description);
  }

  if (schema instanceof ZodBoolean) {
    return withDescription({ type: 'boolean' }, description);
  }

  if (schema instanceof ZodEnum) {
    const values: readonly string[] = schema.options;
    return withDescription({ type: 'string', enum: values }, description);
  }

  if (schema instanceof ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return withDescription({ enum: [value] }, description);
    }
    return withDescription({}, description);
  }

  if (schema instanceof ZodArray) {
    const { minLength, maxLength } = schema._def;
    return withDescription({
      type: 'array',
      items: zodToJsonSchema(schema.element),
      ...(minLength ? { minItems: minLength.value } : {}),
      ...(maxLength ? { maxItems: maxLength.value } : {}),
    }, description);
  }

  return withDescription({}, description);
}

function objectSchema(schema: ZodObject<Record<string, ZodTypeAny>>): JsonObjectSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(schema.shape)) {
    properties[key] = zodToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

/**
 * Tool input schema; non-object inputs are reported as an empty object
 */
export function toInputSchema(schema: ZodTypeAny): JsonObjectSchema {
  const unwrapped = schema instanceof ZodEffects ? schema.innerType() : schema;
  if (unwrapped instanceof ZodObject) {
    return withObjectDescription(objectSchema(unwrapped), unwrapped.description);
  }
  return { type: 'object', properties: {} };
}

function withObjectDescription(schema: JsonObjectSchema, description: string | undefined): JsonObjectSchema {
  return description ? { ...schema, description } : schema;
}
