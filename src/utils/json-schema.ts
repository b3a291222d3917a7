import { z } from 'zod';

export interface JsonSchema {
  type?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: string[];
  default?: unknown;
}

export interface ToolInputSchema extends JsonSchema {
  type: 'object';
  properties: Record<string, JsonSchema>;
}

/**
 * Convert a tool's zod input schema to the JSON Schema MCP clients expect.
 * Covers the zod types the tool schemas use; anything else maps to `{}`.
 */
export function toolInputSchema(schema: z.AnyZodObject): ToolInputSchema {
  const { properties = {}, required, description } = zodToJsonSchema(schema);
  return {
    type: 'object',
    properties,
    ...(required ? { required } : {}),
    ...(description ? { description } : {}),
  };
}

export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const converted = convert(schema);
  return schema.description ? { ...converted, description: schema.description } : converted;
}

function convert(schema: z.ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return required.length > 0
      ? { type: 'object', properties, required }
      : { type: 'object', properties };
  }

  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(schema.element) };
  }
  if (schema instanceof z.ZodString) {
    return { type: 'string' };
  }
  if (schema instanceof z.ZodNumber) {
    return { type: schema.isInt ? 'integer' : 'number' };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }
  if (schema instanceof z.ZodEnum) {
    const values: string[] = [...schema.options];
    return { type: 'string', enum: values };
  }
  if (schema instanceof z.ZodOptional) {
    return zodToJsonSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return { ...zodToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() };
  }
  if (schema instanceof z.ZodEffects) {
    return zodToJsonSchema(schema.innerType());
  }

  return {};
}
