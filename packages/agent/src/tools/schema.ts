import type { ParameterSpec, ToolSpec } from '../types/index.js';

export type JsonSchemaProperty = {
  readonly type: 'string' | 'integer' | 'number' | 'boolean' | 'array';
  readonly description: string;
  readonly items?: { readonly type: 'string' };
  readonly enum?: ReadonlyArray<string>;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly default?: unknown;
};

export type ToolJsonSchema = {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, JsonSchemaProperty>>;
  readonly required: ReadonlyArray<string>;
  readonly additionalProperties: false;
};

export type FunctionDefinition = {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolJsonSchema;
};

function toProperty(parameter: ParameterSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty =
    parameter.type === 'string[]'
      ? { type: 'array', items: { type: 'string' }, description: parameter.description }
      : { type: parameter.type, description: parameter.description };

  return {
    ...property,
    ...(parameter.enum ? { enum: parameter.enum } : {}),
    ...(parameter.minimum === undefined ? {} : { minimum: parameter.minimum }),
    ...(parameter.maximum === undefined ? {} : { maximum: parameter.maximum }),
    ...(parameter.default === undefined ? {} : { default: parameter.default }),
  };
}

export function toJsonSchema(spec: ToolSpec): ToolJsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const parameter of spec.parameters) {
    properties[parameter.name] = toProperty(parameter);
  }
  return {
    type: 'object',
    properties,
    required: spec.parameters.filter((parameter) => parameter.required).map((parameter) => parameter.name),
    additionalProperties: false,
  };
}

export function toFunctionDefinition(spec: ToolSpec): FunctionDefinition {
  return { name: spec.name, description: spec.description, parameters: toJsonSchema(spec) };
}
