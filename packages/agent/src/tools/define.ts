import { z } from 'zod';
import type {
  ArgumentIssue,
  ParameterSpec,
  RegisteredTool,
  ToolCategory,
  ToolContext,
} from '../types/index.js';

type ToolInput<Shape extends z.ZodRawShape> = z.ZodObject<Shape, 'strict'>;

export type ToolDefinition<Shape extends z.ZodRawShape> = {
  readonly name: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly input: ToolInput<Shape>;
  readonly invoke: (args: z.output<ToolInput<Shape>>, ctx: ToolContext) => Promise<unknown>;
  /** Canonical paths the call touches; the dispatcher locks them before invoking. */
  readonly lockTargets?: (args: z.output<ToolInput<Shape>>) => Promise<ReadonlyArray<string>>;
};

type Unwrapped = {
  readonly schema: z.ZodTypeAny;
  readonly required: boolean;
  readonly defaultValue: unknown;
};

function unwrap(schema: z.ZodTypeAny): Unwrapped {
  let current = schema;
  let required = true;
  let defaultValue: unknown = undefined;

  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      required = false;
      defaultValue = current._def.defaultValue();
      current = current.removeDefault();
    } else {
      return { schema: current, required, defaultValue };
    }
  }
}

function describeParameter(name: string, field: z.ZodTypeAny): ParameterSpec {
  const { schema, required, defaultValue } = unwrap(field);
  const base = {
    name,
    description: field.description ?? schema.description ?? '',
    required,
    ...(defaultValue === undefined ? {} : { default: defaultValue }),
  };

  if (schema instanceof z.ZodString) {
    return { ...base, type: 'string' };
  }
  if (schema instanceof z.ZodEnum) {
    const options: ReadonlyArray<string> = schema.options;
    return { ...base, type: 'string', enum: options };
  }
  if (schema instanceof z.ZodBoolean) {
    return { ...base, type: 'boolean' };
  }
  if (schema instanceof z.ZodNumber) {
    return {
      ...base,
      type: schema.isInt ? 'integer' : 'number',
      ...(schema.minValue === null ? {} : { minimum: schema.minValue }),
      ...(schema.maxValue === null ? {} : { maximum: schema.maxValue }),
    };
  }
  if (schema instanceof z.ZodArray && schema.element instanceof z.ZodString) {
    return { ...base, type: 'string[]' };
  }
  throw new Error(`Parameter ${name} uses a schema type with no ParameterSpec mapping`);
}

/**
 * Ordered parameter list derived from a tool's input schema, so what the
 * model is shown and what dispatch enforces come from the same source.
 */
export function describeParameters(input: z.AnyZodObject): ReadonlyArray<ParameterSpec> {
  return Object.entries<z.ZodTypeAny>(input.shape).map(([name, field]) => describeParameter(name, field));
}

export function toArgumentIssues(error: z.ZodError): ReadonlyArray<ArgumentIssue> {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(arguments)',
    message: issue.message,
  }));
}

export function defineTool<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): RegisteredTool {
  const { name, description, category, input, invoke, lockTargets } = definition;

  return {
    spec: { name, description, category, parameters: describeParameters(input) },
    handler: {
      parse(args) {
        const parsed = input.safeParse(args);
        if (!parsed.success) {
          return { ok: false, issues: toArgumentIssues(parsed.error) };
        }
        const values = parsed.data;
        return {
          ok: true,
          call: {
            invoke: (ctx) => invoke(values, ctx),
            lockTargets: async () => (lockTargets ? lockTargets(values) : []),
          },
        };
      },
    },
  };
}
